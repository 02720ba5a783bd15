import { z } from 'zod';
import { HOOK_EVENT_KINDS } from '../../types/index.js';

/** Largest timeout a Node timer can hold (2^31 - 1 ms), in whole seconds */
export const MAX_TIMEOUT_SECONDS = 2147483;

export const ConditionSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('FileExtension'),
    ext: z.string().min(1),
  }),
  z.object({
    type: z.literal('PathPrefix'),
    prefix: z.string().min(1),
  }),
  z.object({
    type: z.literal('FileSizeLimit'),
    op: z.enum(['<', '<=', '>', '>=']),
    bytes: z.number().int().nonnegative(),
  }),
  z.object({
    type: z.literal('PathGlob'),
    pattern: z.string().min(1),
  }),
]);

export const HookDefinitionSchema = z.object({
  name: z.string().min(1),
  eventKind: z.enum(HOOK_EVENT_KINDS),
  toolFilter: z.array(z.string().min(1)).default([]),
  commandLine: z.string().min(1),
  enabled: z.boolean().default(true),
  interactive: z.boolean().default(false),
  advisory: z.boolean().default(false),
  timeoutSeconds: z.number().int().positive().max(MAX_TIMEOUT_SECONDS).default(30),
  conditions: z.array(ConditionSchema).default([]),
  dependsOn: z.string().min(1).optional(),
  matchPattern: z.string().min(1).optional(),
  matchRegex: z.string().min(1).optional(),
  description: z.string().optional(),
});

/** Raw definition as written by the host, before defaults */
export type HookDefinitionInput = z.input<typeof HookDefinitionSchema>;
export type ParsedHookDefinition = z.output<typeof HookDefinitionSchema>;

export const EngineSettingsSchema = z.object({
  outputTailBytes: z.number().int().positive().optional(),
  killGraceMillis: z.number().int().nonnegative().optional(),
  debug: z.boolean().optional(),
});

export const HooksFileSchema = z.object({
  description: z.string().optional(),
  settings: EngineSettingsSchema.optional(),
  // Entries are validated one by one when the registry loads
  hooks: z.array(z.unknown()).default([]),
});

export type HooksFile = z.output<typeof HooksFileSchema>;

/**
 * Render zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}
