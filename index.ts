#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

import { main } from "./src/index.js";

export { main };

// Allow `node dist/index.js` and the installed bin link to execute directly
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  void main(process.argv);
}
