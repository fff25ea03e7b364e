import { z } from "zod";

export const CellTypeSchema = z.enum(["code", "markdown", "raw"]);

/** nbformat stores sources either as one string or as a list of lines. */
export const SourceSchema = z.union([z.string(), z.array(z.string())]);

export const RawCellSchema = z
  .object({
    cell_type: CellTypeSchema,
    source: SourceSchema,
    id: z.string().nullish(),
    metadata: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const RawNotebookSchema = z
  .object({
    cells: z.array(RawCellSchema),
    metadata: z.record(z.unknown()).optional(),
    nbformat: z.number().int().optional(),
    nbformat_minor: z.number().int().optional(),
  })
  .passthrough();

export type RawCell = z.infer<typeof RawCellSchema>;
export type RawNotebook = z.infer<typeof RawNotebookSchema>;

export const DEFAULT_NBFORMAT = 4;
export const DEFAULT_NBFORMAT_MINOR = 5;
