import { writeFile } from "node:fs/promises";
import { createEngine, withEngine, type AssessmentEngine } from "@/lib/engine";
import { createLogger } from "@/lib/log";
import { formatAssessmentReport, formatValidationReport, tierDistribution } from "@/lib/report";
import { Validator, loadGoldStandard } from "@/lib/validation";
import { loadVariantInputs } from "@/lib/variants";
import { VERSION } from "@/lib/version";
import { usage, type CliCommand } from "./args";

export type CliIO = {
  createEngine: (model?: string) => AssessmentEngine;
  print: (text: string) => void;
  writeJson: (path: string, data: unknown) => Promise<void>;
};

export const defaultIO: CliIO = {
  createEngine: model => createEngine({ model }),
  print: text => console.log(text),
  writeJson: (path, data) => writeFile(path, JSON.stringify(data, null, 2) + "\n", "utf8"),
};

/** Runs one parsed command; returns the process exit code. Errors propagate. */
export async function runCommand(command: CliCommand, io: CliIO = defaultIO): Promise<number> {
  const log = createLogger("cli");

  switch (command.kind) {
    case "help":
      io.print(usage);
      return 0;

    case "version":
      io.print(`tumorboard ${VERSION}`);
      return 0;

    case "assess": {
      const assessment = await withEngine(
        () => io.createEngine(command.model),
        engine => engine.assessVariant({ gene: command.gene, variant: command.variant, tumor_type: command.tumorType }),
      );
      io.print(formatAssessmentReport(assessment));
      if (command.output) {
        await io.writeJson(command.output, assessment);
        log.info("wrote assessment", { path: command.output });
      }
      return 0;
    }

    case "batch": {
      const inputs = await loadVariantInputs(command.input);
      const assessments = await withEngine(
        () => io.createEngine(command.model),
        engine => engine.batchAssess(inputs, command.maxConcurrent),
      );
      await io.writeJson(command.output, assessments);

      io.print(`Assessed ${assessments.length} of ${inputs.length} variants, results written to ${command.output}`);
      io.print("Tier distribution:");
      for (const [tier, count] of tierDistribution(assessments)) {
        io.print(`  ${tier}: ${count}`);
      }
      return 0;
    }

    case "validate": {
      const entries = await loadGoldStandard(command.goldStandard);
      const metrics = await withEngine(
        () => io.createEngine(command.model),
        engine => new Validator(engine).validateDataset(entries, command.maxConcurrent),
      );
      io.print(formatValidationReport(metrics));
      if (command.output) {
        await io.writeJson(command.output, metrics);
        log.info("wrote metrics", { path: command.output });
      }
      return 0;
    }
  }
}
