import { z } from "zod";

export const DataTypeSchema = z.enum(["double", "float", "int", "fixedpt"]);
export type DataType = z.infer<typeof DataTypeSchema>;

export const DATA_TYPES: readonly DataType[] = DataTypeSchema.options;

export const InstructionSetSchema = z
  .object({
    name: z.string().min(1),
    flags: z.record(z.string().min(1), z.boolean()).default({}),
  })
  .strip();
export type InstructionSet = z.infer<typeof InstructionSetSchema>;

export const SeedRangeSchema = z
  .object({
    from: z.number().int().nonnegative(),
    to: z.number().int().nonnegative(),
  })
  .strip()
  .refine((range) => range.to >= range.from, { message: "seed range end must be >= start" });

export const SeedsSchema = z.union([z.array(z.number().int().nonnegative()).min(1), SeedRangeSchema]);
export type SeedsSpec = z.infer<typeof SeedsSchema>;

export const SweepDimensionsSchema = z
  .object({
    seeds: SeedsSchema,
    instructionSets: z.array(InstructionSetSchema).min(1),
    dataTypes: z.array(DataTypeSchema).min(1),
    /** Per-dimension truncation before the product; 0 keeps every value. */
    mini: z.number().int().nonnegative().default(0),
  })
  .strip();
export type SweepDimensions = z.infer<typeof SweepDimensionsSchema>;

export type ParameterTuple = Readonly<{
  seed: number;
  instructionSet: Readonly<InstructionSet>;
  dataType: DataType;
}>;

export const StopModeSchema = z.enum(["time", "generations"]);
export type StopMode = z.infer<typeof StopModeSchema>;

export const TrainingResourcesSchema = z
  .object({
    cores: z.number().int().positive().default(1),
    timeSeconds: z.number().int().positive().default(3600),
    generations: z.number().int().positive().optional(),
    stopMode: StopModeSchema.default("time"),
    memory: z.string().min(1).default("8G"),
  })
  .strip();
export type TrainingResources = z.infer<typeof TrainingResourcesSchema>;

/**
 * Trainer parameter document. Known keys are typed; anything else the
 * template carries is kept untouched in the passthrough part.
 */
export const TrainParamsSchema = z
  .object({
    seed: z.number().int().optional(),
    instrType: z.string().optional(),
    instrSetName: z.string().optional(),
    timeMaxTraining: z.number().optional(),
    nbGenerations: z.number().optional(),
  })
  .passthrough();
export type TrainParams = z.infer<typeof TrainParamsSchema>;

export const ResourceParamsSchema = z
  .object({
    nbThreads: z.number().int().optional(),
  })
  .passthrough();
export type ResourceParams = z.infer<typeof ResourceParamsSchema>;

export const UnitStatusSchema = z.enum(["created", "submitted", "running", "completed", "failed"]);
export type UnitStatus = z.infer<typeof UnitStatusSchema>;

export type ExperimentUnit = {
  id: string;
  workDir: string;
  tuple: ParameterTuple;
  status: UnitStatus;
};

export const InferenceConfigSchema = z
  .object({
    tpg: z.string().min(1),
    uarch: z.string().min(1),
    isa: z.string().min(1),
    abi: z.string().min(1),
    dtype: DataTypeSchema,
    compiler: z.string().min(1).optional(),
  })
  .strip();
export type InferenceConfig = z.infer<typeof InferenceConfigSchema>;

const LatencySchema = z
  .union([z.number(), z.string().min(1)])
  .transform((value) => Number(value))
  .refine((value) => Number.isFinite(value), { message: "latency must be a finite number" });

export const InferenceResultSchema = z
  .object({
    simulator: z.string().min(1),
    isa: z.string().min(1),
    abi: z.string().min(1),
    dtype: z.string().min(1),
    tpg_mean_latency: LatencySchema,
    tpg_stddev_latency: LatencySchema,
  })
  .passthrough();
export type InferenceResult = z.infer<typeof InferenceResultSchema>;
