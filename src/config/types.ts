import { z } from "zod";

export const PageStoreConfigSchema = z
  .object({
    capacity: z.number().int().positive().optional(),
  })
  .strict();

export type PageStoreConfig = z.infer<typeof PageStoreConfigSchema>;

export const SessionConfigSchema = z
  .object({
    pageIdParam: z.string().min(1).optional(),
  })
  .strict();

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export const RenderConfigSchema = z
  .object({
    contentType: z.string().min(1).optional(),
  })
  .strict();

export type RenderConfig = z.infer<typeof RenderConfigSchema>;

export const SprigConfigSchema = z
  .object({
    pageStore: PageStoreConfigSchema.optional(),
    session: SessionConfigSchema.optional(),
    render: RenderConfigSchema.optional(),
  })
  .strict();

export type SprigConfig = z.infer<typeof SprigConfigSchema>;
