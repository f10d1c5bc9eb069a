import * as path from 'path';
import { BrowserSessionManager } from '../../src/browser/SessionManager';
import { RateLimiter } from '../../src/limits/RateLimiter';
import { ConcurrencyLimiter } from '../../src/limits/ConcurrencyLimiter';
import { RequestGate } from '../../src/limits/RequestGate';
import type { Logger } from '../../src/utils/logger';
import type { FakePortal } from './fakePortal';
import { FakeClock } from './testDoubles';

/**
 * Started session against a fake portal, with a fake clock so pacing and
 * settle delays cost no real time
 */
export async function startSession(
  portal: FakePortal,
  logger: Logger,
  outputDir: string
): Promise<BrowserSessionManager> {
  const clock = new FakeClock();
  const gate = new RequestGate(
    new RateLimiter({ requestsPerMinute: 600, burstSize: 100 }, logger, clock),
    new ConcurrencyLimiter(1, logger),
    logger
  );
  const session = new BrowserSessionManager(
    portal.launcher,
    gate,
    logger,
    {
      headless: true,
      sessionStatePath: path.join(outputDir, 'session_state.json'),
      defaultTimeoutMs: 1000,
      screenshotDir: path.join(outputDir, 'debug'),
    },
    clock
  );
  await session.start();
  return session;
}
