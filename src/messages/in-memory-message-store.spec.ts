import { InMemoryMessageStore } from './in-memory-message-store';
import { ChatMessage, RetentionPolicy } from './message.types';

const HOUR = 3600_000;
const NOW = 1_700_000_000_000;
const unbounded: RetentionPolicy = { maxMessagesPerChat: 0, maxAgeMs: 0 };

function msg(chatId: string, text: string, timestamp: number): ChatMessage {
  return { chatId, sender: 'alice', text, timestamp };
}

describe('InMemoryMessageStore', () => {
  afterEach(() => jest.restoreAllMocks());

  it('returns the last N messages oldest first', async () => {
    const store = new InMemoryMessageStore(unbounded);
    const t = 1_000_000;
    await store.append('42', msg('42', 'one', t));
    await store.append('42', msg('42', 'two', t + 1));
    await store.append('42', msg('42', 'three', t + 2));

    const result = await store.queryByCount('42', 2);
    expect(result.map((m) => m.text)).toEqual(['two', 'three']);
  });

  it('returns everything when N exceeds the log', async () => {
    const store = new InMemoryMessageStore(unbounded);
    await store.append('42', msg('42', 'one', 1));
    await store.append('42', msg('42', 'two', 2));

    expect(await store.queryByCount('42', 50)).toHaveLength(2);
  });

  it('returns an empty list for an unknown chat', async () => {
    const store = new InMemoryMessageStore(unbounded);
    expect(await store.queryByCount('nope', 10)).toEqual([]);
    expect(await store.queryByTime('nope', HOUR, NOW)).toEqual([]);
  });

  it('selects messages at or after now - duration', async () => {
    const store = new InMemoryMessageStore(unbounded);
    await store.append('42', msg('42', 'old', NOW - 3 * HOUR));
    await store.append('42', msg('42', 'edge', NOW - 2 * HOUR));
    await store.append('42', msg('42', 'recent', NOW - HOUR / 2));

    expect((await store.queryByTime('42', HOUR, NOW)).map((m) => m.text)).toEqual(['recent']);
    expect((await store.queryByTime('42', 2 * HOUR, NOW)).map((m) => m.text)).toEqual([
      'edge',
      'recent',
    ]);
  });

  it('keeps chats apart', async () => {
    const store = new InMemoryMessageStore(unbounded);
    await store.append('a', msg('a', 'for a', 1));
    await store.append('b', msg('b', 'for b', 2));

    expect((await store.queryByCount('a', 10)).map((m) => m.text)).toEqual(['for a']);
    expect((await store.queryByCount('b', 10)).map((m) => m.text)).toEqual(['for b']);
  });

  it('clamps a timestamp that goes backwards', async () => {
    const store = new InMemoryMessageStore(unbounded);
    await store.append('42', msg('42', 'first', 2000));
    await store.append('42', msg('42', 'second', 1000));

    expect((await store.queryByCount('42', 10)).map((m) => m.timestamp)).toEqual([2000, 2000]);
  });

  it('stores the chat id it was appended under', async () => {
    const store = new InMemoryMessageStore(unbounded);
    await store.append('42', msg('other', 'hi', 1));

    const [stored] = await store.queryByCount('42', 1);
    expect(stored.chatId).toBe('42');
  });

  it('hands out frozen copies', async () => {
    const store = new InMemoryMessageStore(unbounded);
    await store.append('42', msg('42', 'hi', 1));

    const result = await store.queryByCount('42', 10);
    expect(Object.isFrozen(result[0])).toBe(true);

    result.pop();
    expect(await store.queryByCount('42', 10)).toHaveLength(1);
  });

  it('drops the oldest messages past the per-chat cap', async () => {
    const store = new InMemoryMessageStore({ maxMessagesPerChat: 3, maxAgeMs: 0 });
    for (let i = 1; i <= 5; i++) {
      await store.append('42', msg('42', `m${i}`, i));
    }

    expect((await store.queryByCount('42', 10)).map((m) => m.text)).toEqual(['m3', 'm4', 'm5']);
  });

  it('drops messages older than the retention age', async () => {
    jest.spyOn(Date, 'now').mockReturnValue(NOW);
    const store = new InMemoryMessageStore({ maxMessagesPerChat: 0, maxAgeMs: HOUR });
    await store.append('42', msg('42', 'stale', NOW - 2 * HOUR));
    await store.append('42', msg('42', 'fresh', NOW - 10 * 60_000));

    expect((await store.queryByCount('42', 10)).map((m) => m.text)).toEqual(['fresh']);
    expect((await store.queryByTime('42', 3 * HOUR, NOW)).map((m) => m.text)).toEqual(['fresh']);
  });
});
