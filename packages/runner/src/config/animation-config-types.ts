import { z } from 'zod';

const DurationMsSchema = z.number().finite().positive();

const isIncreasingToOne = (boundaries: readonly number[]): boolean =>
  boundaries.every((boundary, index) => boundary > (index === 0 ? 0 : boundaries[index - 1] ?? 0))
  && boundaries[boundaries.length - 1] === 1;

const PhaseBoundariesSchema = z
  .tuple([z.number().finite(), z.number().finite(), z.number().finite(), z.number().finite()])
  .refine(isIncreasingToOne, { message: 'Phase boundaries must be strictly increasing, above 0 and end at 1.' });

export const DurationsSchema = z
  .object({
    insert: DurationMsSchema.default(1000),
    search: DurationMsSchema.default(2000),
    delete: DurationMsSchema.default(1000),
    traverse: DurationMsSchema.default(1000),
    mergeStep: DurationMsSchema.default(2000),
  })
  .strict();

export const AnimationConfigSchema = z
  .object({
    durationsMs: DurationsSchema.default({}),
    traversePerNodeMs: DurationMsSchema.optional(),
    speed: z.number().finite().positive().default(1),
    avlPhaseBoundaries: PhaseBoundariesSchema.default([0.35, 0.75, 0.85, 1]),
    huffmanPhaseBoundaries: PhaseBoundariesSchema.default([0.25, 0.5, 0.75, 1]),
    tickIntervalMs: z.number().int().positive().default(50),
    maxQueuedCommands: z.number().int().positive().default(256),
    debug: z.boolean().default(false),
  })
  .strict();

export type AnimationConfig = z.output<typeof AnimationConfigSchema>;
export type AnimationConfigInput = z.input<typeof AnimationConfigSchema>;
export type AnimatedCommandKind = keyof AnimationConfig['durationsMs'];

export const DEFAULT_ANIMATION_CONFIG: AnimationConfig = AnimationConfigSchema.parse({});
