// backend/src/utils/KeyedLock.ts

/**
 * キーごとに処理を直列化するロック
 * 同じキーの処理は到着順に1件ずつ実行され、異なるキー同士は並行に動く
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      // 後続が待っていなければエントリを消す
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** 実行中または待機中のキーの数 */
  get size(): number {
    return this.tails.size;
  }
}
