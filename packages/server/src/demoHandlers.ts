import { z } from 'zod';

import type { Session } from './session';

export const NoticeRequestSchema = z.object({
  content: z.string().min(1),
  durationMs: z.number().int().positive().optional(),
});

/**
 * Handlers the bundled server installs on every session: `echo` returns the
 * payload unchanged, `notify` asks the page to show a notice.
 */
export function registerDemoHandlers(session: Session): void {
  session.on('echo', (payload) => {
    session.emit('echo', payload);
  });

  session.onParsed('notify', NoticeRequestSchema, (request) => {
    session.emit('send-notice', {
      content: request.content,
      ...(request.durationMs !== undefined ? { durationMs: request.durationMs } : {}),
    });
  });
}
