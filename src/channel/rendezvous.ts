export class ChannelClosedError extends Error {
  override readonly name = "ChannelClosedError"

  constructor() {
    super("send on closed channel")
    Object.setPrototypeOf(this, ChannelClosedError.prototype)
  }
}

type PendingSend<T> = {
  value: T
  resolve: () => void
  reject: (reason: unknown) => void
}

type PendingReceive<T> = (result: IteratorResult<T, undefined>) => void

const DONE = { value: undefined, done: true } as const

/**
 * Unbuffered channel with rendezvous hand-off.
 *
 * `send` settles only once a receiver has taken the value, so a producer can never run more than one value
 * ahead of its consumer. Closing the channel ends iteration for receivers and rejects pending sends with
 * `ChannelClosedError`, which is how a consumer tells the producer to stop.
 *
 * @example
 * ```ts
 * const channel = new RendezvousChannel<number>()
 * void (async () => {
 *   await channel.send(1)
 *   channel.close()
 * })()
 * for await (const value of channel) console.log(value)
 * ```
 */
export class RendezvousChannel<T> implements AsyncIterable<T> {
  #senders: PendingSend<T>[] = []
  #receivers: PendingReceive<T>[] = []
  #closed: boolean = false

  get closed(): boolean {
    return this.#closed
  }

  /**
   * Hands `value` to a receiver, waiting for one if none is waiting.
   * An aborted `signal` withdraws the pending value and rejects with the signal's reason.
   */
  send(value: T, signal?: AbortSignal): Promise<void> {
    if (this.#closed) return Promise.reject(new ChannelClosedError())
    if (signal?.aborted) return Promise.reject(signal.reason)

    const receiver = this.#receivers.shift()
    if (receiver) {
      receiver({ value, done: false })
      return Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.#senders.indexOf(pending)
        if (index >= 0) this.#senders.splice(index, 1)
        reject(signal?.reason)
      }

      const pending: PendingSend<T> = {
        value,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort)
          resolve()
        },
        reject: (reason) => {
          signal?.removeEventListener("abort", onAbort)
          reject(reason)
        },
      }

      this.#senders.push(pending)
      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }

  /**
   * Takes the next value, waiting for a sender if none is waiting. Resolves `done` once the channel is closed.
   */
  receive(): Promise<IteratorResult<T, undefined>> {
    const sender = this.#senders.shift()
    if (sender) {
      sender.resolve()
      return Promise.resolve<IteratorResult<T, undefined>>({ value: sender.value, done: false })
    }

    if (this.#closed) return Promise.resolve(DONE)

    return new Promise((resolve) => {
      this.#receivers.push(resolve)
    })
  }

  close(): void {
    if (this.#closed) return
    this.#closed = true

    for (const receiver of this.#receivers) {
      receiver(DONE)
    }
    this.#receivers = []

    for (const sender of this.#senders) {
      sender.reject(new ChannelClosedError())
    }
    this.#senders = []
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
      return: async () => {
        this.close()
        return DONE
      },
    }
  }
}
