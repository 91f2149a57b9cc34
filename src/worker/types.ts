export interface ShareRequest {
  type: 'SHARE'
  path: string
  cycle: number     // share cycle of the selection this request belongs to
}

export interface GetRequest {
  type: 'GET'
  ticket: string    // text as pasted, parsed by the worker
  target: string    // destination directory
}

export interface ShutdownRequest {
  type: 'SHUTDOWN'
}

export type WorkerRequest = ShareRequest | GetRequest
export type WorkerMessage = WorkerRequest | ShutdownRequest

export interface WorkerConfig {
  progressCapacity: number   // bound on each operation's progress channel
}

export const DEFAULT_WORKER_CONFIG: WorkerConfig = {
  progressCapacity: 32
}
