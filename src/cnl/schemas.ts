import { z } from 'zod';

export const MoveNameSchema = z.string().trim().min(1);

export const VerbSchema = z.string().trim().min(1);

export const RelationEntrySchema = z.tuple([MoveNameSchema, VerbSchema]);

export const RelationSpecSchema = z
  .object({
    string: z.string().trim().min(1).optional(),
    inputString: z.string().trim().min(1).optional(),
    beats: z.array(RelationEntrySchema).optional(),
    losesTo: z.array(RelationEntrySchema).optional(),
  })
  .strict();

/** Values that remove a move instead of describing it. */
export const RemovalMarkerSchema = z.union([z.null(), z.literal(false), z.literal('remove')]);

export const MoveDeclarationSchema = z.union([RelationSpecSchema, RemovalMarkerSchema]);

export const VariantDocumentSchema = z
  .object({
    extends: z.string().trim().min(1).optional(),
    moves: z.record(z.string(), MoveDeclarationSchema).optional(),
  })
  .strict();

export type RelationSpecInput = z.infer<typeof RelationSpecSchema>;
export type VariantDocumentInput = z.infer<typeof VariantDocumentSchema>;
