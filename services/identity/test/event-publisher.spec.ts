import pino from 'pino';
import { describe, expect, it } from 'vitest';

import { LogEventPublisher } from '../src/events/event-publisher';

describe('LogEventPublisher', () => {
  it('logs the event with the one-time code redacted', async () => {
    const lines: string[] = [];
    const logger = pino({ level: 'info' }, { write: (line: string) => lines.push(line) });
    const publisher = new LogEventPublisher(logger);

    await publisher.publish('identity.verification_code.issued', {
      accountId: 'account-1',
      authMethodId: 'method-1',
      provider: 'EMAIL',
      destination: 'casey@example.com',
      code: '123456',
      purpose: 'login',
      expiresAt: '2026-01-15T12:05:00.000Z',
    });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 30,
      msg: 'identity event published',
      event: 'identity.verification_code.issued',
      payload: {
        accountId: 'account-1',
        destination: 'casey@example.com',
        code: '[redacted]',
        purpose: 'login',
      },
    });
  });
});
