import { z } from "zod"

const patternList = z.array(z.string())

export const TaskEntrySchema = z.object({
  id: z.string().optional(),
  command: z.string(),
  dependencies: z.array(z.string()).default([]),
  aliases: z.array(z.string()).default([]),
  inputs: patternList.default([]),
  outputs: patternList.default([]),
  auto_remove: z.boolean().default(false),
  timeout: z.string().optional(),
})

export const ConfigSectionSchema = z.object({
  default: z.string().min(1).optional(),
  cache_dir: z.string().min(1).optional(),
  workers: z.number().int().positive().optional(),
  default_timeout: z.string().optional(),
})

export const ConfigFileSchema = z.object({
  config: ConfigSectionSchema.default({}),
  variables: z.record(z.string()).default({}),
  task: z.record(TaskEntrySchema).default({}),
})

export type TaskEntry = z.infer<typeof TaskEntrySchema>
export type ConfigFile = z.infer<typeof ConfigFileSchema>
