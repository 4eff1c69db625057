/** Runs at most `concurrency` tasks at a time; the rest wait in call order. */
export type Limiter = <T>(task: () => Promise<T>) => Promise<T>

export function createLimiter(concurrency: number): Limiter {
  const queue: Array<() => void> = []
  let active = 0

  const next = () => {
    if (active >= concurrency) return
    const start = queue.shift()
    if (!start) return
    active++
    start()
  }

  return <T>(task: () => Promise<T>) =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => {
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            active--
            next()
          })
      })
      next()
    })
}
