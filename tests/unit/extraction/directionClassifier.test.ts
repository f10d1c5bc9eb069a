import { describe, it, expect } from 'vitest';
import { classifyDirection } from '../../../src/extraction/directionClassifier';
import { MessageDirection } from '../../../src/types/Message';

describe('classifyDirection', () => {
  it('should read sent markers from the element itself', () => {
    expect(classifyDirection('message sent')).toBe(MessageDirection.SENT);
    expect(classifyDirection('bubble outgoing')).toBe(MessageDirection.SENT);
    expect(classifyDirection('msg-right')).toBe(MessageDirection.SENT);
  });

  it('should read received markers from the element itself', () => {
    expect(classifyDirection('message received')).toBe(MessageDirection.RECEIVED);
    expect(classifyDirection('msg incoming')).toBe(MessageDirection.RECEIVED);
  });

  it('should prefer the element over its parent', () => {
    expect(classifyDirection('message incoming', 'thread user')).toBe(MessageDirection.RECEIVED);
  });

  it('should fall back to the parent classes', () => {
    expect(classifyDirection('message', 'own-messages')).toBe(MessageDirection.SENT);
  });

  it('should default to received without a signal', () => {
    expect(classifyDirection(undefined)).toBe(MessageDirection.RECEIVED);
    expect(classifyDirection('message', 'chat')).toBe(MessageDirection.RECEIVED);
  });

  it('should match whole class tokens only', () => {
    // "username" and "brightness" contain markers but are not markers
    expect(classifyDirection('username brightness')).toBe(MessageDirection.RECEIVED);
  });

  it('should be case-insensitive', () => {
    expect(classifyDirection('Message SENT')).toBe(MessageDirection.SENT);
  });
});
