import { randomUUID } from 'crypto';
import type { RequestContext, Role } from '../types/records.js';

export type ChatMessage = {
  role: 'user' | 'assistant';
  content: string;
};

export type Session = {
  token: string;
  username: string;
  role: Role;
  createdAt: string;
  chatHistory: ChatMessage[];
};

// In-memory bearer sessions. Restarting the server logs everyone out.
export class SessionManager {
  private readonly sessions = new Map<string, Session>();

  create(username: string, role: Role): Session {
    const session: Session = {
      token: randomUUID(),
      username,
      role,
      createdAt: new Date().toISOString(),
      chatHistory: [],
    };
    this.sessions.set(session.token, session);
    return session;
  }

  get(token: string): Session | null {
    return this.sessions.get(token) ?? null;
  }

  destroy(token: string): boolean {
    return this.sessions.delete(token);
  }

  get size(): number {
    return this.sessions.size;
  }
}

export const contextOf = (session: Session): RequestContext => ({
  actor: session.username,
  role: session.role,
});
