import { z } from 'zod';

/** Reference to an encrypted file on the server, carried inside a visible message. */
export const attachmentPointerSchema = z.object({
  id: z.string().min(1),
  contentType: z.string().min(1),
  byteCount: z.number().int().nonnegative(),
  url: z.string().min(1),
  key: z.string().min(1),
  digest: z.string().min(1),
});

export type AttachmentPointer = z.infer<typeof attachmentPointerSchema>;

export const visibleMessageSchema = z.object({
  kind: z.literal('visible'),
  sentTimestamp: z.number().int(),
  body: z.string().optional(),
  expiresInMs: z.number().int().positive().optional(),
  attachments: z.array(attachmentPointerSchema).default([]),
});

export const readReceiptSchema = z.object({
  kind: z.literal('readReceipt'),
  timestamps: z.array(z.number().int()).min(1),
});

/** Plaintext carried inside an encrypted envelope. */
export const contentSchema = z.discriminatedUnion('kind', [visibleMessageSchema, readReceiptSchema]);

export type VisibleMessageContent = z.infer<typeof visibleMessageSchema>;
export type ReadReceiptContent = z.infer<typeof readReceiptSchema>;
export type Content = z.infer<typeof contentSchema>;

export function encodeContent(content: z.input<typeof contentSchema>): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(content));
}

/** Returns undefined when the plaintext is not a content payload this client understands. */
export function decodeContent(plaintext: Uint8Array): Content | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(new TextDecoder().decode(plaintext));
  } catch {
    return undefined;
  }
  const parsed = contentSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}
