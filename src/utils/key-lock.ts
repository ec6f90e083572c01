/**
 * Keyed Mutex
 *
 * Runs async tasks one at a time per key, in arrival order. Tasks with
 * different keys run independently. Used to make a ledger's
 * load-modify-save cycle atomic with respect to other requests in this process.
 * It does not coordinate separate processes.
 */
export interface KeyLock {
   run<T>(key: string, task: () => Promise<T>): Promise<T>
   readonly size: number
}

export function createKeyLock(): KeyLock {
   // Last settled-marker per key; a new task chains after it
   const tails = new Map<string, Promise<void>>()

   return {
      async run<T>(key: string, task: () => Promise<T>): Promise<T> {
         const previous = tails.get(key) ?? Promise.resolve()
         const current = previous.then(task)
         // The marker only signals completion, the task's error reaches the caller through `current`
         const tail = current.then(() => undefined, () => undefined)
         tails.set(key, tail)

         try {
            return await current
         } finally {
            if (tails.get(key) === tail) tails.delete(key)
         }
      },

      get size() {
         return tails.size
      },
   }
}
