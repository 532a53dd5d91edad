import { RecordingSession } from '@app/shared/types/session.types';

/**
 * Per-guild recording sessions known to one orchestrator. Nothing here is
 * persisted; after a restart sessions are rebuilt from new presence events.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, RecordingSession>(); // guildId → session

  get size(): number {
    return this.sessions.size;
  }

  start(session: RecordingSession): void {
    this.sessions.set(session.guildId, session);
  }

  end(guildId: string): RecordingSession | null {
    const session = this.sessions.get(guildId) ?? null;
    this.sessions.delete(guildId);
    return session;
  }

  get(guildId: string): RecordingSession | null {
    return this.sessions.get(guildId) ?? null;
  }

  list(): RecordingSession[] {
    return [...this.sessions.values()].sort(
      (a, b) => new Date(a.startedAt).getTime() - new Date(b.startedAt).getTime(),
    );
  }

  pruneOlderThan(maxAgeMs: number, now: number = Date.now()): RecordingSession[] {
    const cutoff = now - maxAgeMs;
    const pruned: RecordingSession[] = [];
    for (const [guildId, session] of this.sessions) {
      if (new Date(session.startedAt).getTime() < cutoff) {
        this.sessions.delete(guildId);
        pruned.push(session);
      }
    }
    return pruned;
  }
}
