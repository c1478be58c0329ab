/**
 * Generate CLI command
 */

import { Command } from "commander";
import { loadTypeModel } from "../../lib/loader/index.js";
import { synthesize } from "../../lib/synthesizer/index.js";
import { writeUnits } from "../../lib/emitter/index.js";
import { loadGenerateConfig } from "../../utils/config-loader.js";
import { logger } from "../../utils/logger.js";
import type { BindsmithConfig } from "../../types/config.js";
import { parseConfigFile } from "../config/parser.js";
import type { GenerateCommandOptions } from "../config/types.js";
import { applyLogLevel, failCommand } from "../respond.js";

export function createGenerateCommand(): Command {
  return new Command("generate")
    .description("Generate TypeScript bindings from a type model")
    .option("--schema <path>", "Path to the type model (.yaml, .yml or .json)")
    .option("--out <dir>", "Directory to write the generated sources to")
    .option("--runtime-module <specifier>", "Module the generated code imports the runtime from")
    .option("--no-header", "Omit the auto-generated banner from every file")
    .option("--config <path>", "Path to a JSON or YAML config file")
    .action(async (options: GenerateCommandOptions, command: Command) => {
      try {
        const configFile: BindsmithConfig = options.config ? parseConfigFile(options.config) : {};

        // A level from the config file applies unless --log-level was passed
        const globalSource = command.parent?.getOptionValueSource("logLevel");
        if (configFile.logLevel !== undefined && globalSource !== "cli") {
          applyLogLevel(configFile.logLevel);
        }

        const config = loadGenerateConfig(
          {
            schema: options.schema,
            out: options.out,
            runtimeModule: options.runtimeModule,
            // --no-header only counts when it was actually passed
            header: command.getOptionValueSource("header") === "cli" ? options.header : undefined,
          },
          configFile.generate,
        );

        const startTime = Date.now();
        const api = await loadTypeModel(config.schema);
        const result = synthesize(api, {
          runtimeModule: config.runtimeModule,
          header: config.header,
        });
        const written = await writeUnits(result.units, config.outDir);

        logger.info("Generation complete", { durationMs: Date.now() - startTime });

        console.log(
          JSON.stringify(
            {
              status: "success",
              phase: "generation",
              output: {
                destination: written.destination,
                files: written.written,
                ...result.metadata,
              },
            },
            null,
            2,
          ),
        );
        process.exit(0);
      } catch (error) {
        failCommand(error, "generation");
      }
    });
}
