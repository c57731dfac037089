import type { EditOperation, LogicalKey } from "@vni/engine-core/src/types";

export type EngineRequestBody =
  | { type: "key"; payload: LogicalKey }
  | { type: "reset" }
  | { type: "composition" };

export type EngineRequest = EngineRequestBody & { id: number };

export type EngineResponse =
  | { id: number; type: "key:ok"; payload: EditOperation[] }
  | { id: number; type: "reset:ok" }
  | { id: number; type: "composition:ok"; payload: string }
  | { id: number; type: "error"; message: string };

// Satisfied by worker_threads' MessagePort, parentPort and Worker. A port
// emits "close"; a Worker emits "exit" and "error" instead.
export type MessagePortLike = {
  postMessage(value: unknown): void;
  on(event: "message", listener: (value: unknown) => void): unknown;
  on(event: "close" | "exit", listener: () => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
};

export type ParsedRequest =
  | { ok: true; request: EngineRequest }
  | { ok: false; id: number | null; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isLogicalKey(value: unknown): value is LogicalKey {
  if (!isRecord(value)) return false;
  return (
    (value.char === null || typeof value.char === "string") &&
    (value.state === "press" || value.state === "release") &&
    typeof value.shift === "boolean" &&
    typeof value.isNavigation === "boolean" &&
    typeof value.isWhitespace === "boolean" &&
    typeof value.isBackspace === "boolean"
  );
}

export function parseRequest(data: unknown): ParsedRequest {
  if (!isRecord(data) || typeof data.id !== "number") {
    return { ok: false, id: null, message: "request without id" };
  }
  const id = data.id;
  switch (data.type) {
    case "key":
      if (!isLogicalKey(data.payload)) return { ok: false, id, message: "invalid key payload" };
      return { ok: true, request: { id, type: "key", payload: data.payload } };
    case "reset":
      return { ok: true, request: { id, type: "reset" } };
    case "composition":
      return { ok: true, request: { id, type: "composition" } };
    default:
      return { ok: false, id, message: `unknown request type: ${String(data.type)}` };
  }
}

function isEditOperation(value: unknown): value is EditOperation {
  if (!isRecord(value)) return false;
  if (value.type === "backspace") return typeof value.count === "number";
  return value.type === "insert" && typeof value.char === "string";
}

export function isEngineResponse(value: unknown): value is EngineResponse {
  if (!isRecord(value) || typeof value.id !== "number") return false;
  switch (value.type) {
    case "key:ok":
      return Array.isArray(value.payload) && value.payload.every(isEditOperation);
    case "reset:ok":
      return true;
    case "composition:ok":
      return typeof value.payload === "string";
    case "error":
      return typeof value.message === "string";
    default:
      return false;
  }
}
