/**
 * Runs tasks one at a time per guild, in submission order. Chains of
 * different guilds don't wait on each other. A rejected task still rejects
 * for its caller but doesn't stop the next task of the same guild.
 */
export class GuildTaskQueue {
  private readonly chains = new Map<string, Promise<void>>(); // guildId → tail

  run<T>(guildId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(guildId) ?? Promise.resolve();
    const result = previous.then(task);

    const tail: Promise<void> = result.then(
      () => this.release(guildId, tail),
      () => this.release(guildId, tail),
    );
    this.chains.set(guildId, tail);

    return result;
  }

  pending(guildId: string): boolean {
    return this.chains.has(guildId);
  }

  private release(guildId: string, tail: Promise<void>): void {
    if (this.chains.get(guildId) === tail) {
      this.chains.delete(guildId);
    }
  }
}
