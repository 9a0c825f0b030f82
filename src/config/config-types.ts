import { z } from 'zod'

export const CHART_THEMES = [
  { value: 'dark', label: 'Dark', description: 'Dark background, light text' },
  { value: 'light', label: 'Light', description: 'White background, for printing' },
] as const

export const appConfigSchema = z.object({
  report: z
    .object({
      title: z.string().min(1).default('Expenses report'),
      currency: z.string().min(1).default('€'),
    })
    .default({}),
  paths: z
    .object({
      inputDir: z.string().min(1).default('input'),
      outputDir: z.string().min(1).default('output'),
    })
    .default({}),
  charts: z
    .object({
      smoothingWeight: z.number().min(0).max(1).default(0.9),
      theme: z.enum(['dark', 'light']).default('dark'),
    })
    .default({}),
})

export type AppConfig = z.infer<typeof appConfigSchema>
