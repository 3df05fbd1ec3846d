// Built-in helper script. stdin {"fields", "args"} → stdout JSON; exit 2 on error.
import { normalizeDatastores } from "../src/builtins/datastores";
import { runBuiltinScript } from "../src/builtins/runtime";

await runBuiltinScript(normalizeDatastores);
