/**
 * Scoped entry into nested documents.
 *
 * withFrame() enters one frame, runs the body, and releases the frame on
 * every exit path, so callers never switch back by hand.
 */

import type { BrowserSession, DocumentScope } from '../browser/types';

export async function withFrame<T>(
  session: BrowserSession,
  index: number,
  body: (scope: DocumentScope) => Promise<T>,
): Promise<T> {
  const handle = await session.enterFrame(index);
  try {
    return await body(session.activeScope());
  } finally {
    await handle.release();
  }
}

/**
 * Visit each nested document in order until `body` returns a non-null value.
 * Errors inside one frame go to `onError` and the scan moves on.
 */
export async function findInFrames<T>(
  session: BrowserSession,
  body: (scope: DocumentScope, index: number) => Promise<T | null>,
  onError: (index: number, err: unknown) => void,
): Promise<T | null> {
  const count = await session.frameCount();

  for (let index = 0; index < count; index++) {
    try {
      const found = await withFrame(session, index, (scope) => body(scope, index));
      if (found !== null) return found;
    } catch (err) {
      onError(index, err);
    }
  }

  return null;
}
