/**
 * @module @plugwork/plugin-runtime/context/context-stack
 * Stack of "currently active plugin" references.
 *
 * Each asynchronous execution chain sees its own stack (AsyncLocalStorage),
 * so scopes entered by concurrent requests never interleave. Code running
 * outside any scope shares a root stack.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ContextMismatchError } from '@plugwork/plugin-contracts';

function isPromise<R>(value: R | Promise<R>): value is Promise<R> {
  return value instanceof Promise;
}

export class PluginContextStack<T extends object> {
  private readonly storage = new AsyncLocalStorage<T[]>();
  private readonly rootEntries: T[] = [];

  private entries(): T[] {
    return this.storage.getStore() ?? this.rootEntries;
  }

  get depth(): number {
    return this.entries().length;
  }

  push(entry: T): void {
    this.entries().push(entry);
  }

  /**
   * @throws ContextMismatchError when the stack is empty
   */
  pop(): T {
    const entry = this.entries().pop();
    if (entry === undefined) {
      throw new ContextMismatchError('Plugin context stack is empty');
    }
    return entry;
  }

  peek(): T | undefined {
    const entries = this.entries();
    return entries[entries.length - 1];
  }

  /**
   * Run `fn` with `entry` on top of the stack.
   *
   * `fn` gets a stack of its own, seeded with the caller's entries. The entry
   * is popped when `fn` returns, throws, or, for a promise, settles.
   *
   * @throws ContextMismatchError if something else is on top at exit
   */
  run<R>(entry: T, fn: () => Promise<R>): Promise<R>;
  run<R>(entry: T, fn: () => R): R;
  run<R>(entry: T, fn: () => R | Promise<R>): R | Promise<R> {
    return this.storage.run([...this.entries()], () => {
      this.push(entry);
      let result: R | Promise<R>;
      try {
        result = fn();
      } catch (error) {
        this.release(entry);
        throw error;
      }
      if (isPromise(result)) {
        return result.finally(() => this.release(entry));
      }
      this.release(entry);
      return result;
    });
  }

  private release(entry: T): void {
    const popped = this.pop();
    if (popped !== entry) {
      throw new ContextMismatchError('Popped wrong plugin', {
        expected: String(entry),
        actual: String(popped),
      });
    }
  }
}
