import { randomUUID } from "node:crypto";
import { StudySession } from "../session/studySession.js";

export interface SessionEntry {
  id: string;
  session: StudySession;
  createdAt: string;
}

/** Sessions of the running process; nothing outlives it. */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionEntry>();

  constructor(private readonly sessionFactory: () => StudySession) {}

  create(): SessionEntry {
    const entry: SessionEntry = {
      id: randomUUID(),
      session: this.sessionFactory(),
      createdAt: new Date().toISOString(),
    };
    this.sessions.set(entry.id, entry);
    return entry;
  }

  get(id: string): SessionEntry {
    const entry = this.sessions.get(id);
    if (!entry) {
      throw new Error(`Unknown session_id: ${id}`);
    }
    return entry;
  }

  remove(id: string): boolean {
    return this.sessions.delete(id);
  }

  list(): SessionEntry[] {
    return [...this.sessions.values()];
  }
}
