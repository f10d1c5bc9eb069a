import { MessageDirection } from '../types/Message';

const SENT_MARKERS = new Set(['sent', 'outgoing', 'right', 'own', 'user']);
const RECEIVED_MARKERS = new Set(['received', 'incoming', 'left', 'other', 'company']);

function classTokens(className: string | undefined): string[] {
  if (!className) {
    return [];
  }
  return className
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);
}

/**
 * Infers whether a message was sent or received from class names.
 *
 * The element's own classes are checked first (sent, then received), then
 * the parent's. Without a signal the message counts as RECEIVED: a missed
 * sent message is preferred over a false one.
 */
export function classifyDirection(
  ownClassName: string | undefined,
  parentClassName?: string
): MessageDirection {
  const own = classTokens(ownClassName);
  if (own.some((token) => SENT_MARKERS.has(token))) {
    return MessageDirection.SENT;
  }
  if (own.some((token) => RECEIVED_MARKERS.has(token))) {
    return MessageDirection.RECEIVED;
  }

  const parent = classTokens(parentClassName);
  if (parent.some((token) => SENT_MARKERS.has(token))) {
    return MessageDirection.SENT;
  }
  return MessageDirection.RECEIVED;
}
