declare module 'hypercore-crypto' {
  interface HypercoreCrypto {
    randomBytes(n: number): Buffer
  }
  const crypto: HypercoreCrypto
  export = crypto
}

declare module 'hyperswarm' {
  export interface JoinOptions {
    client?: boolean
    server?: boolean
  }

  class Hyperswarm {
    constructor()
    join(topic: Buffer, options?: JoinOptions): unknown
    leave(topic: Buffer): Promise<void>
    destroy(): Promise<void>
    flush(): Promise<void>
    on(event: 'connection', handler: (conn: unknown) => void): this
    on(event: 'error', handler: (err: Error) => void): this
  }

  export default Hyperswarm
}

declare module 'corestore' {
  export interface ReplicationStream {
    pipe(dest: ReplicationStream): ReplicationStream
    destroy(): void
  }

  class Corestore {
    constructor(storage: string)
    ready(): Promise<void>
    replicate(isInitiator: boolean): ReplicationStream
    replicate(stream: unknown): ReplicationStream
    namespace(name: string): Corestore
    close(): Promise<void>
  }

  export default Corestore
}

declare module 'hyperdrive' {
  import Corestore from 'corestore'

  export interface HyperdriveEntry {
    key: string
    seq: number
  }

  export interface DriveWriteStream {
    write(data: Buffer): boolean
    end(): void
    destroy(err?: Error): void
    once(event: 'drain' | 'close', handler: () => void): this
    once(event: 'error', handler: (err: Error) => void): this
  }

  class Hyperdrive {
    constructor(store: Corestore, key?: Buffer | null)
    ready(): Promise<void>
    entry(path: string): Promise<HyperdriveEntry | null>
    createReadStream(path: string): AsyncIterable<Buffer>
    createWriteStream(path: string): DriveWriteStream
    close(): Promise<void>
    key: Buffer
    discoveryKey: Buffer
    findingPeers(): () => void
  }

  export default Hyperdrive
}

declare module 'b4a' {
  interface B4A {
    toString(buf: Buffer, encoding?: BufferEncoding): string
    from(data: string | Buffer, encoding?: BufferEncoding): Buffer
    alloc(size: number): Buffer
  }
  const b4a: B4A
  export = b4a
}
