import { z } from 'zod';

export const TreeValueSchema = z.union([z.number().finite(), z.string().min(1)]);

export const FrequencySchema = z.number().int().nonnegative();

export const SymbolSchema = z.string().min(1);

export const FrequencyEntrySchema = z.tuple([SymbolSchema, FrequencySchema]);

/** Accepted by `build`: an object keyed by symbol or an ordered list of [symbol, frequency] pairs. */
export const FrequencyInputSchema = z.union([
  z.array(FrequencyEntrySchema),
  z.record(SymbolSchema, FrequencySchema),
]);

export interface SerializedBstNode {
  readonly value: number | string;
  readonly left: SerializedBstNode | null;
  readonly right: SerializedBstNode | null;
}

export interface SerializedAvlNode {
  readonly value: number | string;
  readonly height: number;
  readonly left: SerializedAvlNode | null;
  readonly right: SerializedAvlNode | null;
}

export interface SerializedHuffmanNode {
  readonly frequency: number;
  readonly symbol: string | null;
  readonly left: SerializedHuffmanNode | null;
  readonly right: SerializedHuffmanNode | null;
}

export const SerializedBstNodeSchema: z.ZodType<SerializedBstNode> = z.lazy(() =>
  z
    .object({
      value: TreeValueSchema,
      left: SerializedBstNodeSchema.nullable(),
      right: SerializedBstNodeSchema.nullable(),
    })
    .strict(),
);

export const SerializedAvlNodeSchema: z.ZodType<SerializedAvlNode> = z.lazy(() =>
  z
    .object({
      value: TreeValueSchema,
      height: z.number().int().positive(),
      left: SerializedAvlNodeSchema.nullable(),
      right: SerializedAvlNodeSchema.nullable(),
    })
    .strict(),
);

export const SerializedHuffmanNodeSchema: z.ZodType<SerializedHuffmanNode> = z.lazy(() =>
  z
    .object({
      frequency: FrequencySchema,
      symbol: SymbolSchema.nullable(),
      left: SerializedHuffmanNodeSchema.nullable(),
      right: SerializedHuffmanNodeSchema.nullable(),
    })
    .strict(),
);

export const SerializedBstTreeSchema = z
  .object({
    kind: z.literal('bst'),
    root: SerializedBstNodeSchema.nullable(),
  })
  .strict();

export const SerializedAvlTreeSchema = z
  .object({
    kind: z.literal('avl'),
    root: SerializedAvlNodeSchema.nullable(),
  })
  .strict();

export const SerializedHuffmanTreeSchema = z.union([
  z
    .object({
      kind: z.literal('huffman'),
      frequencies: z.array(FrequencyEntrySchema),
    })
    .strict(),
  z
    .object({
      kind: z.literal('huffman'),
      root: SerializedHuffmanNodeSchema.nullable(),
    })
    .strict(),
]);

export type SerializedBstTree = z.infer<typeof SerializedBstTreeSchema>;
export type SerializedAvlTree = z.infer<typeof SerializedAvlTreeSchema>;
export type SerializedHuffmanTree = z.infer<typeof SerializedHuffmanTreeSchema>;
