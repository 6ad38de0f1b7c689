import { parseArgs } from "node:util";
import { loadConfig } from "../src/config.js";
import { createToolkit } from "../src/bootstrap.js";
import { TOOL_NAMES, callTool, isToolName } from "../src/tools.js";
import { errorMessage } from "../src/errors.js";

const { positionals, values } = parseArgs({
  allowPositionals: true,
  options: {
    json: { type: "string", default: "{}" },
    "timeout-ms": { type: "string" }
  }
});

const op = positionals[0] ?? "";
if (!isToolName(op)) {
  // eslint-disable-next-line no-console
  console.error(`Usage: query <${TOOL_NAMES.join("|")}> --json '{"zone":"whole building","goal":"max"}'`);
  process.exit(2);
}

let params: unknown;
try {
  params = JSON.parse(values.json ?? "{}");
} catch (err) {
  // eslint-disable-next-line no-console
  console.error(`--json is not valid JSON: ${errorMessage(err)}`);
  process.exit(2);
}

const timeoutMs = values["timeout-ms"] ? Number(values["timeout-ms"]) : undefined;
const toolkit = await createToolkit(loadConfig());
try {
  const result = await callTool(toolkit.tools, op, params, { timeoutMs });
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(result, null, 2));
  process.exitCode = result.ok ? 0 : 1;
} finally {
  await toolkit.close();
}
