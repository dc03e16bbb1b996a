import { z } from "zod";

export const CoordSchema = z.object({
  row: z.number().int({ error: "Row must be an integer" }),
  col: z.number().int({ error: "Column must be an integer" }),
});

export const SearchOptionsSchema = z.object({
  maxIterations: z
    .number()
    .int()
    .positive({ error: "maxIterations must be a positive integer" })
    .optional(),
  signal: z
    .custom<AbortSignal>((value) => value instanceof AbortSignal, {
      error: "signal must be an AbortSignal",
    })
    .optional(),
  random: z
    .custom<() => number>((value) => typeof value === "function", {
      error: "random must be a function returning numbers in [0, 1)",
    })
    .optional(),
});

/**
 * A single cell of a cost matrix: a non-negative finite entry cost, or
 * `null` for an impassable cell.
 */
export const CostCellSchema = z
  .number()
  .min(0, { error: "Tile costs must be non-negative" })
  .nullable();

export const CostMatrixSchema = z
  .array(
    z.array(CostCellSchema).min(1, { error: "Grid rows cannot be empty" }),
  )
  .min(1, { error: "Grid must have at least one row" })
  .refine(
    (rows) => rows.every((row) => row.length === rows[0]?.length),
    { error: "Grid rows must all have the same length" },
  );

export type SearchOptions = z.infer<typeof SearchOptionsSchema>;
