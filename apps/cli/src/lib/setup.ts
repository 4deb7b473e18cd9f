import type { ConnectionConfig } from "@myjob/shared";
import type { RemoteSession, SessionFactory } from "@/core/session.ts";
import { createSshSession } from "@/core/ssh.ts";

/**
 * Open a session, hand it to `fn`, and close it on every exit path.
 */
export async function withSession<T>(
  connection: ConnectionConfig,
  fn: (session: RemoteSession) => Promise<T>,
  openSession: SessionFactory = createSshSession,
): Promise<T> {
  return withOpenSession(openSession(connection), fn);
}

/** `withSession` for a session built by the caller. */
export async function withOpenSession<T>(
  session: RemoteSession,
  fn: (session: RemoteSession) => Promise<T>,
): Promise<T> {
  try {
    await session.connect();
    return await fn(session);
  } finally {
    await session.close();
  }
}
