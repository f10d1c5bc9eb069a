import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { cleanMessageText } from '../utils/textCleaner';

/**
 * Message direction, inferred from markup rather than read from the site
 */
export enum MessageDirection {
  SENT = 'sent',
  RECEIVED = 'received',
}

/**
 * Schema for a chat message
 */
export const MessageSchema = z.object({
  id: z.string().min(1, 'Message ID is required'),
  sender: z.string().min(1, 'Sender is required'),
  direction: z.nativeEnum(MessageDirection),
  timestamp: z.date(),
  rawText: z.string().min(1, 'Message text is required'),
  cleanedText: z.string(),
  attachments: z.array(z.string()),
  sourceUrl: z.string(),
});

type MessageRecord = z.infer<typeof MessageSchema>;

/**
 * Immutable message record
 */
export type Message = Readonly<Omit<MessageRecord, 'attachments'> & { attachments: readonly string[] }>;

export interface MessageInput {
  id?: string;
  sender: string;
  direction: MessageDirection;
  timestamp: Date;
  rawText: string;
  attachments?: string[];
  sourceUrl: string;
}

/**
 * Validates and freezes a message. `cleanedText` is derived from `rawText`.
 * @throws ZodError if a required field is empty
 */
export function createMessage(input: MessageInput): Message {
  const record = MessageSchema.parse({
    id: input.id ?? uuidv4(),
    sender: input.sender,
    direction: input.direction,
    timestamp: input.timestamp,
    rawText: input.rawText,
    cleanedText: cleanMessageText(input.rawText),
    attachments: input.attachments ?? [],
    sourceUrl: input.sourceUrl,
  });
  return Object.freeze({ ...record, attachments: Object.freeze([...record.attachments]) });
}
