// Built-in helper script. stdin {"fields", "args"} → stdout JSON; exit 2 on error.
import { filterMounts } from "../src/builtins/filterMounts";
import { runBuiltinScript } from "../src/builtins/runtime";

await runBuiltinScript(filterMounts);
