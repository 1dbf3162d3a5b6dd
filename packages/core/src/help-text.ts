import { graphemeCount } from "@argot/unicode";
import { z } from "zod";
import { NonEmptyStringSchema, rejectInvalid } from "./config.js";
import type { Configuration } from "./configuration.js";
import { ENGLISH, type Language } from "./language.js";
import { longPattern, shortPattern } from "./patterns.js";

export interface HelpTextOptions {
  programName: string;
  version?: string | undefined;
  /** A line below the program name */
  description?: string | undefined;
  /** Name in the usage line; defaults to the program name */
  executable?: string | undefined;
  language?: Language | undefined;
}

export const HelpTextOptionsSchema = z.object({
  programName: NonEmptyStringSchema,
  version: z.string().optional(),
  description: z.string().optional(),
  executable: NonEmptyStringSchema.optional(),
});

export function validateHelpTextOptions(options: HelpTextOptions): void {
  const checked = HelpTextOptionsSchema.safeParse(options);
  if (!checked.success) {
    rejectInvalid("ARGUMENT_OPTIONS_INVALID", "help options", checked.error);
  }
}

function padding(width: number, target: number): string {
  return " ".repeat(Math.max(0, target - width));
}

function annotation(configuration: Configuration, language: Language): string {
  const allowedValues = configuration._tag === "Value" ? configuration.allowedValues : undefined;
  const separator = configuration.help === undefined ? "" : " ";
  let text = "";
  if (allowedValues !== undefined) {
    text += `${separator}[${language.allowedValues}: ${allowedValues.join(", ")}`;
    text += configuration.default === undefined ? "]" : " | ";
  }
  if (configuration.default !== undefined) {
    if (allowedValues === undefined) {
      text += `${separator}[`;
    }
    text += `${language.default}: ${configuration.default}]`;
  }
  return text;
}

/**
 * Render help text for a list of configurations.
 *
 * ```text
 * {program} {version}
 * {description}
 *
 * {executable} [OPTIONS]
 *
 * OPTIONS:
 *   --[no-]verbose        | -v           Log more. [Default: false]
 *   --name(=| )VALUE      | -n[=| ]VALUE  Who to greet.
 * ```
 *
 * Columns align on grapheme counts.
 */
export function renderHelpText(
  configurations: readonly Configuration[],
  options: HelpTextOptions,
): string {
  const language = options.language ?? ENGLISH;
  const title =
    options.version === undefined ? options.programName : `${options.programName} ${options.version}`;

  let text = `${title}\n`;
  if (options.description !== undefined) {
    text += `${options.description}\n`;
  }
  text += `\n${options.executable ?? options.programName} [${language.options}]\n\n`;
  text += `${language.options}:\n`;

  const rows = configurations.map((configuration) => {
    const long = longPattern(configuration.names, configuration);
    return {
      configuration,
      long,
      longWidth: graphemeCount(long),
      short: shortPattern(configuration.names, configuration),
    };
  });
  const maxLongWidth = Math.max(0, ...rows.map((row) => row.longWidth));

  const columns = rows.map(({ configuration, long, longWidth, short }) => {
    const name =
      short === undefined ? long : `${long}${padding(longWidth, maxLongWidth)} | ${short}`;
    return { configuration, name, width: graphemeCount(name) };
  });
  const maxNameWidth = Math.max(0, ...columns.map((column) => column.width));

  for (const { configuration, name, width } of columns) {
    const line =
      `  ${name}${padding(width, maxNameWidth + 2)}` +
      `${configuration.help ?? ""}${annotation(configuration, language)}`;
    text += `${line.replace(/ +$/, "")}\n`;
  }
  return text;
}
