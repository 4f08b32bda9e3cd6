import { z } from 'zod'
import type { VariableSpec } from '../core/types'

export const VariableSpecSchema = z.union([
  z.string().transform((content): VariableSpec => ({ type: 'value', content })),
  z.discriminatedUnion('type', [
    z.object({
      type: z.literal('value'),
      content: z.string().describe('Literal text substituted as-is.'),
      description: z.string().optional(),
    }),
    z.object({
      type: z.literal('file'),
      path: z.string().min(1).describe('Path relative to the workspace root, read at resolution time.'),
      description: z.string().optional(),
    }),
  ]).transform((spec): VariableSpec => spec.type === 'value'
    ? { type: 'value', content: spec.content }
    : { type: 'file', path: spec.path }),
])

export const NamespaceSchema = z.record(z.string().regex(/^\w+$/, 'Variable names must match [A-Za-z0-9_]+'), VariableSpecSchema)

export const ModelParamsSchema = z.object({
  provider: z.string().min(1).optional().describe('Provider preset name, e.g. \'openai\' or \'ollama\''),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
})

export const DelimitersSchema = z.object({
  start: z.string().min(1),
  end: z.string().min(1),
}).refine(d => d.start !== d.end, { message: 'Start and end delimiters must differ' })

export const WorkspaceConfigSchema = z.object({
  name: z.string().default('My Workspace'),
  version: z.string().default('1.0'),
  paths: z.object({
    prompts: z.string().default('prompts').describe('Directory holding prompt templates.'),
    vars: z.string().default('prompts/vars').describe('Directory holding <name>.yaml variable files.'),
    chains: z.string().default('chains').describe('Directory holding <chain>.yaml chain files.'),
  }).default({}),
  template: z.object({
    delimiters: DelimitersSchema.default({ start: '{', end: '}' }),
    naming: z.object({
      pattern: z.string().default('{role}-{name}.st').describe('Tokens: {role}, {name}, {ext}.'),
      roles: z.array(z.string().min(1)).default(['system', 'user']),
      varsExtension: z.string().default('.yaml'),
    }).default({}),
  }).default({}),
  matching: z.object({
    warnOrphans: z.boolean().default(true).describe('List orphan files after the groups.'),
  }).default({}),
  defaults: ModelParamsSchema.default({}),
  variables: NamespaceSchema.default({}),
})

export const UserConfigSchema = z.object({
  provider: z.string().min(1).default('openai'),
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  models: z.array(z.string()).default([]),
  defaults: ModelParamsSchema.default({}),
})

const RoleTemplatesSchema = z.object({
  system: z.string().optional(),
  user: z.string().optional(),
  assistant: z.string().optional(),
})

export const ChainStepFileSchema = z.object({
  name: z.string().min(1),
  output: z.string().regex(/^\w+$/, 'Output variable must match [A-Za-z0-9_]+'),
  prompts: RoleTemplatesSchema.default({}).describe('Prompt file paths relative to the prompt directory.'),
  templates: RoleTemplatesSchema.default({}).describe('Inline template text; wins over prompts for the same role.'),
  variables: z.record(VariableSpecSchema).default({}),
  params: ModelParamsSchema.optional(),
})

export const ChainFileSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  defaults: ModelParamsSchema.optional(),
  variables: z.record(VariableSpecSchema).default({}),
  steps: z.array(ChainStepFileSchema).min(1),
}).superRefine((chain, ctx) => {
  const names = new Set<string>()
  const outputs = new Set<string>()
  chain.steps.forEach((step, i) => {
    if (names.has(step.name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['steps', i, 'name'], message: `Duplicate step name '${step.name}'` })
    }
    if (outputs.has(step.output)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['steps', i, 'output'], message: `Duplicate output variable '${step.output}'` })
    }
    names.add(step.name)
    outputs.add(step.output)
  })
})

export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>
export type UserConfig = z.infer<typeof UserConfigSchema>
export type ChainFile = z.infer<typeof ChainFileSchema>
export type ChainStepFile = z.infer<typeof ChainStepFileSchema>

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
}
