import { z } from 'zod'

export const DEFAULT_TIMEOUT = 10 // seconds; lengthen only while debugging a scenario interactively

export const TimeoutSecondsSchema = z.number().positive().finite()

export const MessageNameSchema = z.string().min(1)

export const LockstepOptionsSchema = z.object({
  timeout: TimeoutSecondsSchema.default(DEFAULT_TIMEOUT),
  verbose: z.boolean().default(false),
})

export type LockstepOptions = z.input<typeof LockstepOptionsSchema>
