import { Engine } from "@vni/engine-core/src/engine";
import { parseRequest, type EngineRequest, type EngineResponse, type MessagePortLike } from "./protocol";

export function respond(engine: Engine, request: EngineRequest): EngineResponse {
  switch (request.type) {
    case "key":
      return { id: request.id, type: "key:ok", payload: engine.handleKey(request.payload) };
    case "reset":
      engine.reset();
      return { id: request.id, type: "reset:ok" };
    case "composition":
      return { id: request.id, type: "composition:ok", payload: engine.composition };
  }
}

/** Answers every request on `port` in arrival order. Requests without an id are dropped. */
export function serveEngine(port: MessagePortLike, engine: Engine = new Engine()): void {
  port.on("message", (data) => {
    const parsed = parseRequest(data);
    if (!parsed.ok) {
      if (parsed.id !== null) {
        const error: EngineResponse = { id: parsed.id, type: "error", message: parsed.message };
        port.postMessage(error);
      }
      return;
    }
    port.postMessage(respond(engine, parsed.request));
  });
}
