import { z } from "zod";

// YAML happily turns `1.0` or `true` into non-strings; properties are always text
const ScalarString = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const NodeSchema = z
  .object({
    name: z.string().min(1).default("built-in"),
    // installation name -> home directory on this node
    tool_locations: z.record(z.string()).default({}),
  })
  .strict();

export const StepConfigSchema = z
  .object({
    targets: z.string().default(""),
    ant_name: z.string().min(1).optional(),
    ant_opts: z.string().optional(),
    build_file: z.string().optional(),
    properties: z.string().optional(),

    variables: z.record(ScalarString).default({}),
    sensitive_variables: z.array(z.string().min(1)).default([]),

    module_root: z.string().min(1).optional(),

    node: NodeSchema.default({}),
  })
  .strict();

export type StepConfig = z.infer<typeof StepConfigSchema>;
