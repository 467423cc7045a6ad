import { z } from 'zod';

const OptionalCwd = z
  .string()
  .nullish()
  .transform((value) => (typeof value === 'string' && value.trim() ? value.trim() : null));

export const ReplyActionSchema = z.object({
  action: z.literal('reply'),
  message: z.string().default(''),
});

export const RunShellActionSchema = z.object({
  action: z.literal('run_shell'),
  command: z.string().trim().min(1),
  cwd: OptionalCwd,
});

export const RunScriptActionSchema = z.object({
  action: z.literal('run_script'),
  code: z.string().min(1).refine((code) => code.trim().length > 0, 'code must not be blank'),
  cwd: OptionalCwd,
});

export const DecisionActionSchema = z.discriminatedUnion('action', [
  ReplyActionSchema,
  RunShellActionSchema,
  RunScriptActionSchema,
]);

export type DecisionAction = z.infer<typeof DecisionActionSchema>;
