import { z } from "zod";

export const GlobalFlagsSchema = z.object({
  verbose: z.boolean().optional(),
});

export const RunFlagsSchema = GlobalFlagsSchema.extend({
  config: z.string(),
  impl: z.array(z.string()).optional(),
  category: z.array(z.string()).optional(),
  output: z.string().optional(),
  concurrency: z.number().int().positive().optional(),
});

export const ListFlagsSchema = GlobalFlagsSchema.extend({
  config: z.string(),
});

export const ValidateFlagsSchema = GlobalFlagsSchema.extend({
  identifier: z.string(),
  type: z.string().optional(),
  variant: z.string().optional(),
});

export type GlobalFlags = z.infer<typeof GlobalFlagsSchema>;
export type RunFlags = z.infer<typeof RunFlagsSchema>;
export type ListFlags = z.infer<typeof ListFlagsSchema>;
export type ValidateFlags = z.infer<typeof ValidateFlagsSchema>;

export type Commands = {
  command: "run";
  options: RunFlags;
} | {
  command: "list";
  options: ListFlags;
} | {
  command: "validate";
  options: ValidateFlags;
};
