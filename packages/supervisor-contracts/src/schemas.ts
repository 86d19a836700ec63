/**
 * Zod Schemas for Workflow Configuration Validation
 *
 * Validates programmatic workflow options and workflow definitions loaded from YAML.
 */

import { z } from 'zod';
import { DEFAULT_SUPERVISOR_NAME } from './agent.js';

/**
 * Default recursion guard: maximum number of agent steps per invocation.
 */
export const DEFAULT_ITERATION_LIMIT = 25;

/**
 * Agent name: case-sensitive, no whitespace
 */
export const AgentNameSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9_-]+$/, 'Agent name must contain only letters, digits, "_" or "-"');

/**
 * History aggregation mode
 */
export const OutputModeSchema = z.enum(['full_history', 'last_message']);

export type OutputMode = z.infer<typeof OutputModeSchema>;

/**
 * Workflow options schema (defaults applied on parse)
 */
export const WorkflowOptionsSchema = z.object({
  // Names given in code are taken as given; files go through AgentNameSchema
  supervisorName: z.string().min(1).default(DEFAULT_SUPERVISOR_NAME),
  outputMode: OutputModeSchema.default('last_message'),
  addHandoffBackMessages: z.boolean().default(true),
  iterationLimit: z.number().int().positive().default(DEFAULT_ITERATION_LIMIT),
  messageLimit: z.number().int().positive().optional(),
});

export type WorkflowOptionsInput = z.input<typeof WorkflowOptionsSchema>;
export type WorkflowOptions = z.output<typeof WorkflowOptionsSchema>;

/**
 * Per-invocation options (signal and observers are not data and are not checked)
 */
export const InvokeOptionsSchema = z.object({
  timeoutMs: z.number().int().positive().optional(),
  startIndex: z.number().int().nonnegative().optional(),
  runId: z.string().min(1).optional(),
});

/**
 * Result a step resolves with
 */
export const StepResultSchema = z.object({
  turns: z.array(z.object({ content: z.string() })).optional(),
  decision: z
    .discriminatedUnion('action', [
      z.object({ action: z.literal('handoff'), to: z.string().min(1), reason: z.string().optional() }),
      z.object({ action: z.literal('finish'), answer: z.string() }),
    ])
    .optional(),
});

/**
 * Agent entry in a workflow file (the step is bound in code)
 */
export const AgentDefinitionSchema = z.object({
  name: AgentNameSchema,
  capabilities: z.array(z.string().min(1)).default([]),
  instruction: z.string().min(1),
});

export type AgentDefinition = z.output<typeof AgentDefinitionSchema>;

/**
 * Complete workflow file schema
 */
export const WorkflowFileSchema = z.object({
  supervisor: AgentDefinitionSchema.extend({
    name: AgentNameSchema.default(DEFAULT_SUPERVISOR_NAME),
  }),
  agents: z.array(AgentDefinitionSchema).min(1),
  options: WorkflowOptionsSchema.omit({ supervisorName: true }).default({}),
});

export type WorkflowFile = z.output<typeof WorkflowFileSchema>;

/**
 * Format zod issues as `path: message` lines.
 */
export function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
