import { createHmac, randomBytes, timingSafeEqual } from "node:crypto";

export type Role = "admin" | "agent" | "viewer";

export interface UserCredential {
  username: string;
  password: string;
  role: Role;
}

export interface Session {
  token: string;
  username: string;
  role: Role;
  createdAt: string;
  expiresAt: string;
}

const COMPARE_KEY = "complaint-desk-credential-compare";
const DEFAULT_TTL_MS = 8 * 60 * 60 * 1000;

/** HMAC both sides first so the comparison length never depends on the input. */
export function safeEqual(a: string, b: string): boolean {
  const left = createHmac("sha256", COMPARE_KEY).update(a).digest();
  const right = createHmac("sha256", COMPARE_KEY).update(b).digest();
  return timingSafeEqual(left, right);
}

/**
 * In-memory bearer sessions for the admin API. Users with an empty password
 * cannot log in.
 */
export class SessionService {
  private readonly sessions = new Map<string, Session>();

  constructor(
    private readonly users: UserCredential[],
    private readonly ttlMs: number = DEFAULT_TTL_MS
  ) {}

  /** Also drops every session that has expired by `now`. */
  login(username: string, password: string, now: Date = new Date()): Session | null {
    this.pruneExpired(now);
    const user = this.users.find(
      (candidate) => candidate.password !== "" && safeEqual(candidate.username, username) && safeEqual(candidate.password, password)
    );
    if (!user) {
      return null;
    }
    const session: Session = {
      token: randomBytes(32).toString("base64url"),
      username: user.username,
      role: user.role,
      createdAt: now.toISOString(),
      expiresAt: new Date(now.getTime() + this.ttlMs).toISOString(),
    };
    this.sessions.set(session.token, session);
    return session;
  }

  resolve(token: string, now: Date = new Date()): Session | null {
    const session = this.sessions.get(token);
    if (!session) {
      return null;
    }
    if (session.expiresAt <= now.toISOString()) {
      this.sessions.delete(token);
      return null;
    }
    return session;
  }

  logout(token: string): boolean {
    return this.sessions.delete(token);
  }

  private pruneExpired(now: Date): void {
    const cutoff = now.toISOString();
    for (const [token, session] of this.sessions) {
      if (session.expiresAt <= cutoff) {
        this.sessions.delete(token);
      }
    }
  }
}
