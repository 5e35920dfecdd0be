import PQueue from "p-queue"

// 固定数量的worker并行处理, 结果按输入顺序排列
export async function parallelMap<I, O>(
  items: readonly I[],
  concurrency: number,
  fn: (item: I, index: number) => Promise<O>,
): Promise<O[]> {
  const queue = new PQueue({ concurrency })
  const results = new Array<O>(items.length)

  const tasks = items.map((item, index) =>
    queue.add(async () => {
      results[index] = await fn(item, index)
    }))

  try {
    await Promise.all(tasks)
  }
  catch (err) {
    // 放弃还没开始的任务
    queue.clear()
    throw err
  }
  return results
}

export type Outcome<T> =
  | { ok: true, value: T }
  | { ok: false, error: unknown }

// 单个任务失败不影响其它任务
export async function settle<T>(fn: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await fn() }
  }
  catch (error) {
    return { ok: false, error }
  }
}
