import { Injectable } from '@nestjs/common';

/** FIFO mutex: waiters are released in the order they queued. */
class FifoMutex {
  private readonly queue: Array<() => void> = [];
  private locked = false;

  acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(() => this.release());
    }
    return new Promise((resolve) => {
      this.queue.push(() => resolve(() => this.release()));
    });
  }

  isIdle(): boolean {
    return !this.locked && this.queue.length === 0;
  }

  private release() {
    const next = this.queue.shift();
    if (next) next();
    else this.locked = false;
  }
}

/**
 * Per-chat serialization for message log operations.
 *
 * Operations on the same chat run one at a time in arrival order; different
 * chats never wait on each other. Idle mutexes are dropped so the map only
 * holds chats with work in flight.
 */
@Injectable()
export class ChatLockService {
  private readonly locks = new Map<string, FifoMutex>();

  async runExclusive<T>(chatId: string, fn: () => Promise<T>): Promise<T> {
    let mutex = this.locks.get(chatId);
    if (!mutex) {
      mutex = new FifoMutex();
      this.locks.set(chatId, mutex);
    }

    const release = await mutex.acquire();
    try {
      return await fn();
    } finally {
      release();
      if (mutex.isIdle() && this.locks.get(chatId) === mutex) {
        this.locks.delete(chatId);
      }
    }
  }

  /** Number of chats with a held or queued lock. */
  activeChats(): number {
    return this.locks.size;
  }
}
