import { z } from "zod";

const NameSchema = z
  .string()
  .min(1)
  .max(63)
  .regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/, { message: "Must be a lowercase DNS label" });

// Service schemas
export const CreateServiceSchema = z.object({
  name: NameSchema,
  labels: z.record(z.string().min(1), z.string()).optional(),
  assignedAddress: z.string().ip({ version: "v4" }).optional(),
});

export const ListServicesQuerySchema = z.object({
  labelSelector: z.string().optional(),
});

// Type exports
export type CreateServiceBody = z.infer<typeof CreateServiceSchema>;
export type ListServicesQuery = z.infer<typeof ListServicesQuerySchema>;
