import type { Response } from 'express';

export function responseAbortSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort(new Error('client closed request'));
    }
  });
  return controller.signal;
}
