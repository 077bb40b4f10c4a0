// ============================================================================
// TsuryPhone Bridge - Session Registry
// Keyed lookup from device id to its live session. At most one session
// exists per id.
// ============================================================================

import type { DeviceSession } from './deviceSession.js';
import { UnknownDeviceError } from './errors.js';

export class SessionRegistry {
  private sessions = new Map<string, DeviceSession>();

  /** Register a session under its id. Throws if the id is already taken. */
  add(session: DeviceSession): void {
    if (this.sessions.has(session.id)) {
      throw new Error(`Device already registered: ${session.id}`);
    }
    this.sessions.set(session.id, session);
  }

  /** Look up a session, throwing UnknownDeviceError when there is none */
  get(id: string): DeviceSession {
    const session = this.sessions.get(id);
    if (!session) {
      throw new UnknownDeviceError(id);
    }
    return session;
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  /** Remove and return a session, or undefined if it was not registered */
  remove(id: string): DeviceSession | undefined {
    const session = this.sessions.get(id);
    this.sessions.delete(id);
    return session;
  }

  ids(): string[] {
    return [...this.sessions.keys()];
  }

  all(): DeviceSession[] {
    return [...this.sessions.values()];
  }

  get size(): number {
    return this.sessions.size;
  }
}
