import { Response } from 'express';

/**
 * Signal that fires when the client goes away before the response is sent.
 */
export function abortSignalFor(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}
