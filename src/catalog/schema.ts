/**
 * Definition source schema
 *
 * Zod schemas for the YAML command definitions and their conversion into
 * the in-memory CommandSpec model.
 */

import { z, ZodError } from 'zod';
import { localized, plain } from '../i18n/index.js';
import type { CommandExample, CommandSpec, FlagCombo, FlagSpec, LocalizedText } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

export const LocalizedTextSchema = z.union([
  z.string(),
  z
    .record(z.string(), z.string())
    .refine((value) => Object.keys(value).length > 0, {
      message: 'translation map must contain at least one language',
    }),
]);

export const FlagSourceSchema = z
  .object({
    long: z.string().min(2).optional(),
    short: z
      .string()
      .refine((value) => [...value].length === 1 && value !== '-', {
        message: 'short flag must be a single character',
      })
      .optional(),
    description: LocalizedTextSchema.default(''),
    takes_value: z.boolean().default(false),
  })
  .refine((flag) => flag.long !== undefined || flag.short !== undefined, {
    message: 'flag needs a long or a short name',
  });

export const ExampleSourceSchema = z.object({
  cmd: z.string().min(1),
  scenario: LocalizedTextSchema.default(''),
});

export const FlagComboSourceSchema = z.object({
  combo: z.string().min(1),
  description: LocalizedTextSchema.default(''),
});

export interface CommandSource {
  name: string;
  description: z.infer<typeof LocalizedTextSchema>;
  subcommands: CommandSource[];
  flags: z.infer<typeof FlagSourceSchema>[];
  examples: z.infer<typeof ExampleSourceSchema>[];
  flag_combos: z.infer<typeof FlagComboSourceSchema>[];
  path_completion?: boolean;
  is_path_completion?: boolean;
}

type CommandSourceInput = Omit<
  CommandSource,
  'description' | 'subcommands' | 'flags' | 'examples' | 'flag_combos'
> & {
  description?: z.input<typeof LocalizedTextSchema>;
  subcommands?: CommandSourceInput[];
  flags?: z.input<typeof FlagSourceSchema>[];
  examples?: z.input<typeof ExampleSourceSchema>[];
  flag_combos?: z.input<typeof FlagComboSourceSchema>[];
};

export const CommandSourceSchema: z.ZodType<CommandSource, z.ZodTypeDef, CommandSourceInput> = z.lazy(() =>
  z.object({
    name: z
      .string()
      .min(1)
      .regex(/^\S+$/, { message: 'command name must not contain whitespace' }),
    description: LocalizedTextSchema.default(''),
    subcommands: z.array(CommandSourceSchema).default([]),
    flags: z.array(FlagSourceSchema).default([]),
    examples: z.array(ExampleSourceSchema).default([]),
    flag_combos: z.array(FlagComboSourceSchema).default([]),
    path_completion: z.boolean().optional(),
    // Older definition files use this spelling
    is_path_completion: z.boolean().optional(),
  })
);

/** A definition file holds one command or a list of commands */
export const DefinitionFileSchema = z.union([CommandSourceSchema, z.array(CommandSourceSchema)]);

// ============================================================================
// Conversion
// ============================================================================

function toLocalizedText(value: z.infer<typeof LocalizedTextSchema>): LocalizedText {
  return typeof value === 'string' ? plain(value) : localized(value);
}

function toFlag(source: z.infer<typeof FlagSourceSchema>): FlagSpec {
  return {
    long: source.long,
    short: source.short,
    description: toLocalizedText(source.description),
    takesValue: source.takes_value,
  };
}

function toExample(source: z.infer<typeof ExampleSourceSchema>): CommandExample {
  return { cmd: source.cmd, scenario: toLocalizedText(source.scenario) };
}

function toFlagCombo(source: z.infer<typeof FlagComboSourceSchema>): FlagCombo {
  return { combo: source.combo, description: toLocalizedText(source.description) };
}

export function toCommandSpec(source: CommandSource): CommandSpec {
  return {
    name: source.name,
    description: toLocalizedText(source.description),
    subcommands: source.subcommands.map(toCommandSpec),
    flags: source.flags.map(toFlag),
    examples: source.examples.map(toExample),
    flagCombos: source.flag_combos.map(toFlagCombo),
    pathCompletion: source.path_completion ?? source.is_path_completion ?? false,
  };
}

/**
 * Validate a parsed YAML document and convert it to command specs.
 * Throws ZodError when the document does not match the schema.
 */
export function parseDefinitionDocument(document: unknown): CommandSpec[] {
  const parsed = DefinitionFileSchema.parse(document);
  const sources = Array.isArray(parsed) ? parsed : [parsed];
  return sources.map(toCommandSpec);
}

/**
 * Flatten a ZodError into "path: message" lines
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '<document>';
    return `${path}: ${issue.message}`;
  });
}
