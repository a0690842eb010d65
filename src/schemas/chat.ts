import { z } from 'zod'

// Message content is either plain text or an array of typed content parts
const messageContentSchema = z.union([
  z.string(),
  z.array(z.object({ type: z.string().min(1, 'Content part type is required') }).passthrough()),
  z.null(),
])

const chatMessageSchema = z
  .object({
    role: z.string().min(1, 'Message role is required'),
    content: messageContentSchema,
  })
  .passthrough()

// OpenAI chat completion request. Unknown parameters are forwarded untouched.
export const chatCompletionRequestSchema = z
  .object({
    // Empty or missing means the gateway's default model
    model: z.string().nullish(),
    messages: z.array(chatMessageSchema).min(1, 'At least one message is required'),
    temperature: z.number().nullish(),
    top_p: z.number().nullish(),
    max_tokens: z.number().int().positive('max_tokens must be positive').nullish(),
    stream: z.boolean().nullish(),
  })
  .passthrough()
