import { Worker } from "node:worker_threads";
import type { EditOperation, LogicalKey } from "@vni/engine-core/src/types";
import { isEngineResponse, type EngineRequestBody, type EngineResponse, type MessagePortLike } from "./protocol";

export class EngineWorkerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EngineWorkerError";
  }
}

type Pending = {
  resolve: (response: EngineResponse) => void;
  reject: (error: Error) => void;
};

export class EngineWorkerClient {
  private port: MessagePortLike;
  private nextId = 1;
  private pending = new Map<number, Pending>();
  private closed: EngineWorkerError | null = null;

  constructor(port: MessagePortLike) {
    this.port = port;
    this.port.on("message", (data) => {
      if (!isEngineResponse(data)) return;
      const entry = this.pending.get(data.id);
      if (!entry) return;
      this.pending.delete(data.id);
      if (data.type === "error") entry.reject(new EngineWorkerError(data.message));
      else entry.resolve(data);
    });
    this.port.on("close", () => this.fail("engine port closed"));
    this.port.on("exit", () => this.fail("engine worker exited"));
    this.port.on("error", (error) => this.fail(`engine worker failed: ${error.message}`));
  }

  async handleKey(key: LogicalKey): Promise<EditOperation[]> {
    const response = await this.rpc({ type: "key", payload: key });
    if (response.type !== "key:ok") throw unexpected("key", response);
    return response.payload;
  }

  async reset(): Promise<void> {
    const response = await this.rpc({ type: "reset" });
    if (response.type !== "reset:ok") throw unexpected("reset", response);
  }

  async composition(): Promise<string> {
    const response = await this.rpc({ type: "composition" });
    if (response.type !== "composition:ok") throw unexpected("composition", response);
    return response.payload;
  }

  // Rejects everything in flight; later requests reject at once.
  private fail(reason: string): void {
    if (this.closed) return;
    this.closed = new EngineWorkerError(reason);
    for (const entry of this.pending.values()) entry.reject(this.closed);
    this.pending.clear();
  }

  private rpc(body: EngineRequestBody): Promise<EngineResponse> {
    if (this.closed) return Promise.reject(this.closed);
    const id = this.nextId++;
    return new Promise<EngineResponse>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      this.port.postMessage({ ...body, id });
    });
  }
}

function unexpected(request: string, response: EngineResponse): EngineWorkerError {
  return new EngineWorkerError(`unexpected ${response.type} response to ${request}`);
}

// worker.mjs registers tsx in the new thread before loading worker.ts.
export function spawnEngineWorker(): { client: EngineWorkerClient; worker: Worker } {
  const worker = new Worker(new URL("./worker.mjs", import.meta.url), { execArgv: [] });
  return { client: new EngineWorkerClient(worker), worker };
}
