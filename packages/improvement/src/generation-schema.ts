import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

/** Shape the reasoning service must return for one improvement */
export const GeneratedImprovementSchema = z
  .object({
    title: z.string().trim().min(1),
    description: z.string(),
    changes: z
      .array(
        z
          .object({
            path: z.string().trim().min(1),
            kind: z.enum(['create', 'modify', 'delete']),
            content: z.string(),
            description: z.string(),
          })
          .strict(),
      )
      .min(1),
    verificationScript: z.string().nullable().optional(),
  })
  .strict();

export type GeneratedImprovement = z.infer<typeof GeneratedImprovementSchema>;

export const GENERATED_IMPROVEMENT_JSON_SCHEMA = zodToJsonSchema(GeneratedImprovementSchema, {
  $refStrategy: 'none',
});
