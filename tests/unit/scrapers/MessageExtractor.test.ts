import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { MessageExtractor } from '../../../src/scrapers/messages/MessageExtractor';
import { MessageParser } from '../../../src/scrapers/messages/MessageParser';
import type { BrowserSessionManager } from '../../../src/browser/SessionManager';
import { RecordStore } from '../../../src/database/RecordStore';
import { SessionUnavailableError } from '../../../src/types/errors';
import { MessageDirection } from '../../../src/types/Message';
import { FakePortal, type FakeRoute } from '../../fixtures/fakePortal';
import { conversationPage, inboxPage } from '../../fixtures/portalPages';
import { startSession } from '../../fixtures/session';
import { createSpyLogger } from '../../fixtures/testDoubles';

const testOutputDir = path.join(__dirname, '../../test-output/messages');
const baseUrl = 'https://portal.example.test';
const now = new Date('2025-09-08T06:30:00.000Z');

const routes: Record<string, FakeRoute> = {
  '/student/messages': () =>
    inboxPage([
      { company: 'Acme Labs', href: '/student/chat/1' },
      { company: 'Globex', target: '/student/chat/2' },
      { company: 'Initech', href: '/student/chat/3' },
    ]),
  '/student/chat/1': () =>
    conversationPage([
      { direction: 'received', sender: 'Acme HR', text: 'Interview on Monday?', time: '10:15' },
      { direction: 'sent', text: 'Yes, that works for me', time: '10:20' },
    ]),
  '/student/chat/2': () =>
    conversationPage([{ direction: 'received', sender: 'Globex', text: 'Offer letter attached', time: 'Sep 1, 2025' }]),
  '/student/chat/3': () => conversationPage([{ direction: 'received', text: 'Please confirm your joining date' }]),
};

describe('MessageExtractor', () => {
  let logger: ReturnType<typeof createSpyLogger>;
  let portal: FakePortal;
  let session: BrowserSessionManager;

  async function extractorFor(options: { slowPaths?: string[]; routes?: Record<string, FakeRoute> } = {}, store?: RecordStore) {
    portal = new FakePortal({ routes: options.routes ?? routes, slowPaths: options.slowPaths });
    session = await startSession(portal, logger, testOutputDir);
    return new MessageExtractor(
      session,
      new MessageParser(logger),
      logger,
      { baseUrl, now: () => now, pageTimeoutMs: 100, threadTimeoutMs: 100 },
      store
    );
  }

  beforeEach(() => {
    logger = createSpyLogger();
  });

  afterEach(async () => {
    await session.close();
    if (fs.existsSync(testOutputDir)) {
      fs.rmSync(testOutputDir, { recursive: true });
    }
  });

  it('should extract messages from every conversation', async () => {
    const extractor = await extractorFor();

    const result = await extractor.extractMessages();

    expect(result.conversationsProcessed).toBe(3);
    expect(result.conversationsSkipped).toBe(0);
    expect(result.messages.map((message) => [message.direction, message.cleanedText])).toEqual([
      [MessageDirection.RECEIVED, 'Interview on Monday?'],
      [MessageDirection.SENT, 'Yes, that works for me'],
      [MessageDirection.RECEIVED, 'Offer letter attached'],
      [MessageDirection.RECEIVED, 'Please confirm your joining date'],
    ]);
    expect(result.messages[2].sourceUrl).toBe('https://portal.example.test/student/chat/2');
  });

  it('should open threads without a link from the inbox', async () => {
    const extractor = await extractorFor();

    await extractor.extractMessages();

    expect(portal.visits).toEqual([
      'https://portal.example.test/student/messages',
      'https://portal.example.test/student/chat/1',
      'https://portal.example.test/student/messages',
      'https://portal.example.test/student/chat/2',
      'https://portal.example.test/student/chat/3',
    ]);
  });

  it('should leave out sent messages on request', async () => {
    const extractor = await extractorFor();

    const result = await extractor.extractMessages({ includeSent: false });

    expect(result.messages).toHaveLength(3);
    expect(result.messages.every((message) => message.direction === MessageDirection.RECEIVED)).toBe(true);
  });

  it('should stop once the limit is reached', async () => {
    const extractor = await extractorFor();

    const result = await extractor.extractMessages({ limit: 2 });

    expect(result.messages).toHaveLength(2);
    expect(result.conversationsProcessed).toBe(1);
  });

  it('should filter by age and keyword', async () => {
    const extractor = await extractorFor();

    const recent = await extractor.extractMessages({ sinceDays: 7 });
    const offers = await extractor.extractMessages({ keyword: 'OFFER' });

    expect(recent.messages.map((message) => message.cleanedText)).not.toContain('Offer letter attached');
    expect(recent.messages).toHaveLength(3);
    expect(offers.messages.map((message) => message.sender)).toEqual(['Globex']);
  });

  it('should count only matching messages toward the limit', async () => {
    const extractor = await extractorFor();

    const result = await extractor.extractMessages({ limit: 1, keyword: 'offer' });

    expect(result.messages.map((message) => message.cleanedText)).toEqual(['Offer letter attached']);
    expect(result.conversationsProcessed).toBe(2);
  });

  it('should skip a conversation that cannot be opened', async () => {
    const extractor = await extractorFor({ slowPaths: ['/student/chat/3'] });

    const result = await extractor.extractMessages();

    expect(result.conversationsProcessed).toBe(3);
    expect(result.conversationsSkipped).toBe(1);
    expect(result.messages).toHaveLength(3);
    expect(logger.warn).toHaveBeenCalledWith('Skipped conversation', {
      index: 2,
      error: 'Could not open conversation 3',
    });
  });

  it('should return nothing when the inbox does not render', async () => {
    const extractor = await extractorFor({ routes: {} });

    const result = await extractor.extractMessages();

    expect(result).toEqual({ messages: [], conversationsProcessed: 0, conversationsSkipped: 0 });
    expect(logger.warn).toHaveBeenCalledWith('Messages page not found or not loaded', {
      url: 'https://portal.example.test/student/messages',
    });
  });

  it('should store messages and record the run', async () => {
    const store = new RecordStore(':memory:', logger);
    const extractor = await extractorFor({}, store);

    await extractor.extractMessages();

    expect(store.countMessages()).toBe(4);
    expect(store.getRun(1)).toMatchObject({ kind: 'messages', status: 'completed', processed: 3, extracted: 4 });
    store.close();
  });

  it('should abort when the browser goes away', async () => {
    const store = new RecordStore(':memory:', logger);
    const extractor = await extractorFor({}, store);
    portal.crash();

    await expect(extractor.extractMessages()).rejects.toBeInstanceOf(SessionUnavailableError);
    expect(store.getRun(1)).toMatchObject({
      status: 'failed',
      errorMessage: 'Browser process is no longer connected',
    });
    store.close();
  });
});
