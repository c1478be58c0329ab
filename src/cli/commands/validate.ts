/**
 * Validate CLI command: loads and resolves a type model without writing anything
 */

import { Command } from "commander";
import { loadTypeModel } from "../../lib/loader/index.js";
import { createSynthesisTools } from "../../lib/synthesizer/index.js";
import type { ValidateConfigSection } from "../../types/config.js";
import { parseConfigFile, validateConfigSection } from "../config/parser.js";
import type { ValidateCommandOptions } from "../config/types.js";
import { failCommand } from "../respond.js";

/**
 * Type model path from the config file, for when --schema is absent
 */
function configuredSchema(configPath: string | undefined): string {
  const section: ValidateConfigSection | undefined = configPath
    ? parseConfigFile(configPath).validate
    : undefined;
  validateConfigSection<ValidateConfigSection, "schema">(section, ["schema"], "validate");
  return section.schema;
}

export function createValidateCommand(): Command {
  return new Command("validate")
    .description("Check that a type model loads and resolves")
    .option("--schema <path>", "Path to the type model (.yaml, .yml or .json)")
    .option("--config <path>", "Path to a JSON or YAML config file")
    .action(async (options: ValidateCommandOptions) => {
      try {
        const api = await loadTypeModel(options.schema ?? configuredSchema(options.config));
        const { names } = createSynthesisTools();

        console.log(
          JSON.stringify(
            {
              status: "success",
              phase: "validation",
              namespaces: api.namespaces.map((namespace) => ({
                name: namespace.name,
                alias: names.argName(namespace.name),
                types: namespace.dataTypes.map((dataType) => ({
                  name: names.publicName(dataType.name),
                  kind: dataType.kind,
                })),
              })),
            },
            null,
            2,
          ),
        );
        process.exit(0);
      } catch (error) {
        failCommand(error, "validation");
      }
    });
}
