import { z } from 'zod'

const DecimalStringSchema = z.string().regex(/^\d+$/)

// Persisted form of a Reading; null stands for "not available"
export const StoredReadingSchema = z.object({
  packets: DecimalStringSchema.nullable(),
  bytes: DecimalStringSchema.nullable(),
  rate: z.string().nullable(),
  counterOid: z.string(),
})

export const StoredSnapshotSchema = z.object({
  id: z.string(),
  counterType: z.string(),
  savedAt: z.string(),
  namespaces: z.record(z.string(), z.record(z.string(), StoredReadingSchema)),
})

export type StoredReading = z.infer<typeof StoredReadingSchema>
export type StoredSnapshot = z.infer<typeof StoredSnapshotSchema>

// Dump of the counters database: namespace -> key -> field -> value
export const CounterDumpSchema = z.record(
  z.string(),
  z.record(z.string(), z.record(z.string(), z.string()))
)

export const CounterTypeConfigSchema = z.object({
  nameMapKey: z.string().min(1),
  nameHeader: z.string().min(1),
  label: z.string().min(1),
})

export const FlowstatConfigSchema = z.object({
  store: z.object({
    dumpPath: z.string().min(1).optional(),
  }).default({}),
  cache: z.object({
    dir: z.string().min(1).optional(),
  }).default({}),
  counterTypes: z.record(z.string(), CounterTypeConfigSchema).default({}),
})
