/**
 * Per-command, per-user cooldowns. Expired entries are pruned on every check.
 */
export class CooldownTracker {
  /** Expiry timestamp (ms) by command, then by user */
  private expiries = new Map<string, Map<string, number>>();

  /**
   * Start a cooldown unless one is still running.
   * @returns Seconds remaining when still cooling down, otherwise null
   */
  check(commandName: string, userId: string, cooldownSeconds: number, now: number = Date.now()): number | null {
    let users = this.expiries.get(commandName);
    if (!users) {
      users = new Map();
      this.expiries.set(commandName, users);
    }

    for (const [id, expiresAt] of users) {
      if (expiresAt <= now) users.delete(id);
    }

    const expiresAt = users.get(userId);
    if (expiresAt !== undefined) {
      return (expiresAt - now) / 1000;
    }

    users.set(userId, now + cooldownSeconds * 1000);
    return null;
  }

  /** Users still cooling down for a command, as of the last check */
  activeCount(commandName: string): number {
    return this.expiries.get(commandName)?.size ?? 0;
  }

  clear(commandName: string): void {
    this.expiries.delete(commandName);
  }
}
