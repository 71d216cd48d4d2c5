import { z } from 'zod';

/**
 * A node of a ComfyUI API-format workflow graph
 */
export const workflowNodeSchema = z
  .object({
    class_type: z.string().optional(),
    inputs: z.record(z.unknown()),
  })
  .passthrough();

/**
 * Job descriptor: node id → node
 */
export const jobDescriptorSchema = z.record(workflowNodeSchema);

export type WorkflowNode = z.infer<typeof workflowNodeSchema>;
export type JobDescriptor = z.infer<typeof jobDescriptorSchema>;

/**
 * `POST /upload/image` response
 */
export const uploadImageResponseSchema = z.object({
  name: z.string().min(1),
  subfolder: z.string().optional(),
  type: z.string().optional(),
});

/**
 * `POST /prompt` response
 */
export const queuePromptResponseSchema = z.object({
  prompt_id: z.string().min(1),
  number: z.number().optional(),
  node_errors: z.record(z.unknown()).optional(),
});

/**
 * Image descriptor inside an `executed` event
 */
export const outputImageSchema = z.object({
  filename: z.string().min(1),
  subfolder: z.string().default(''),
  type: z.string().default('output'),
});

export type OutputImageReference = z.infer<typeof outputImageSchema>;

/**
 * `executed` push event; other event types are not modelled
 */
export const executedEventSchema = z.object({
  type: z.literal('executed'),
  data: z.object({
    prompt_id: z.string(),
    node: z.string().optional(),
    output: z
      .object({
        images: z.array(outputImageSchema).optional(),
      })
      .passthrough()
      .nullish(),
  }),
});

export type ExecutedEvent = z.infer<typeof executedEventSchema>;
