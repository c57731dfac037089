import { parentPort } from "node:worker_threads";
import { Engine } from "@vni/engine-core/src/engine";
import { serveEngine } from "./serve";

if (parentPort) serveEngine(parentPort, new Engine());
