import { emitKeypressEvents, type Key } from "node:readline";
import { readConfig } from "./config";
import { fromTerminal } from "./keys";
import { formatTrace, renderStatus } from "./render";
import { createPlaygroundStore } from "./state";

const HELP = "VNI playground: digits 1-9 add marks, ctrl+l clears, ctrl+c quits";

const config = readConfig();
const store = createPlaygroundStore({
  hostCommitsTrigger: config.hostCommitsTrigger,
  trace: config.trace ? (event) => console.error(formatTrace(event)) : undefined
});

function draw(): void {
  const lines = [HELP, "", ...renderStatus(store.getState())];
  process.stdout.write(`\x1b[2J\x1b[H${lines.join("\n")}\n`);
}

function quit(): void {
  if (process.stdin.isTTY) process.stdin.setRawMode(false);
  process.stdin.pause();
}

emitKeypressEvents(process.stdin);
if (process.stdin.isTTY) process.stdin.setRawMode(true);
store.subscribe(draw);

process.stdin.on("keypress", (str: string | undefined, key: Key | undefined) => {
  if (key?.ctrl && key.name === "c") return quit();
  if (key?.ctrl && key.name === "l") return store.getState().clear();
  store.getState().pressKey(fromTerminal(str, key));
});
process.stdin.on("end", quit);

draw();
