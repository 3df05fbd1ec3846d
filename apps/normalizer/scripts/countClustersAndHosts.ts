// Built-in helper script. stdin {"fields", "args"} → stdout JSON; exit 2 on error.
import { countClustersAndHosts } from "../src/builtins/clusters";
import { runBuiltinScript } from "../src/builtins/runtime";

await runBuiltinScript(countClustersAndHosts);
