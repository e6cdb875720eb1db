import { Session } from '../types/session';
import { KeyedLock } from '../utils/keyedLock';

/**
 * Per-story image session registry.
 *
 * Holds one record per story plus a single-slot lock per story that is
 * busy. The lock guards session initialization; reads do not take it.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly locks = new KeyedLock();

  get(storyId: string): Session | undefined {
    const session = this.sessions.get(storyId);
    return session ? cloneSession(session) : undefined;
  }

  set(session: Session): void {
    this.sessions.set(session.storyId, cloneSession(session));
  }

  delete(storyId: string): boolean {
    return this.sessions.delete(storyId);
  }

  clear(): void {
    this.sessions.clear();
  }

  storyIds(): string[] {
    return Array.from(this.sessions.keys());
  }

  /** Runs `fn` with exclusive access to the story's session. */
  withLock<T>(storyId: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.run(storyId, fn);
  }

  get lockCount(): number {
    return this.locks.size;
  }
}

function cloneSession(session: Session): Session {
  return {
    ...session,
    artBibleSnapshot: session.artBibleSnapshot ? { ...session.artBibleSnapshot } : null,
    characterReferenceSnapshots: { ...session.characterReferenceSnapshots },
  };
}
