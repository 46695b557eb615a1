/**
 * Unbounded queue of one-shot messages from tasks to the coordinator that
 * launched them. `send` never waits; `receive` resolves with the oldest
 * undelivered message, waiting for one to arrive if necessary.
 */
export class Mailbox<T extends object> {
  private readonly messages: T[] = [];
  private readonly receivers: ((message: T) => void)[] = [];

  public receive(): Promise<T> {
    const message = this.messages.shift();
    if (message !== undefined) {
      return Promise.resolve(message);
    }
    return new Promise<T>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  public send(message: T): void {
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(message);
      return;
    }
    this.messages.push(message);
  }
}
