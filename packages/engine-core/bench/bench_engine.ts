import { Engine } from "../src/engine";
import { keysFromText } from "../src/keys";

const e = new Engine();
const keys = keysFromText("Vie6t5 Nam la2 mo65t quo6c gia cu3a nguo72i Vie6t ");

const t0 = performance.now();
for (let i = 0; i < 1000; i++) e.handleKeys(keys);
const dt = performance.now() - t0;
console.log(`bench_engine ms: ${dt.toFixed(2)} (${keys.length * 1000} keys)`);
