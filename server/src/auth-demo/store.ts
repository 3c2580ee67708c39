export interface StoredUser {
  email: string;
  passwordHash: string;
  createdAt: Date;
}

/**
 * Process-local user registry keyed by normalized (trimmed, lower-cased)
 * email. Contents are lost on restart.
 */
export class InMemoryUserStore {
  private users = new Map<string, StoredUser>();

  static normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
  }

  has(email: string): boolean {
    return this.users.has(InMemoryUserStore.normalizeEmail(email));
  }

  get(email: string): StoredUser | undefined {
    return this.users.get(InMemoryUserStore.normalizeEmail(email));
  }

  /** Returns false (and stores nothing) when the email is taken. */
  add(email: string, passwordHash: string): boolean {
    const key = InMemoryUserStore.normalizeEmail(email);
    if (this.users.has(key)) return false;
    this.users.set(key, { email: key, passwordHash, createdAt: new Date() });
    return true;
  }

  get size(): number {
    return this.users.size;
  }
}
