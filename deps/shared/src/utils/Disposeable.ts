export interface AsyncDisposeable {
  [Symbol.asyncDispose](): Promise<void>;
}

export async function dispose(...targets: AsyncDisposeable[]) {
  for (const target of targets) {
    await target[Symbol.asyncDispose]();
  }
}
