// apps/normalizer/src/index.ts
import path from "node:path";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { CliUsageError, makeArgvHelpers } from "cli-utils";
import type { NormalizedRecord, RawBundle } from "shared-types";
import { logger } from "./logger";
import { createNormalizerDeps, normalizeFromSchema } from "./normalize";
import { detectSchemasForBundle, discoverSchemas, loadSchemaFromFile } from "./schemaLoader";
import { isRecord } from "./values";

const HELP_TEXT = `
Usage:
  normalizer --raw <bundle.json> (--schema <file> | --schemaDir <dir>) [--out <file>]

Required:
  --raw        Raw audit bundle (JSON object) collected from one host
  --schema     Report schema to apply
  --schemaDir  Directory of report schemas; every schema whose detection keys
               match the bundle is applied and the output maps name -> record

Optional:
  --out        Write the normalized JSON here instead of stdout
  --help, -h   Show this help

Environment:
  LOG_LEVEL                       winston level for stderr logs (default: info)
  NORMALIZER_BUILTIN_SCRIPTS_DIR  Override the built-in helper scripts directory
  NORMALIZER_SCRIPT_TIMEOUT_CAP   Upper bound in seconds for every script timeout

Exit codes:
  0  success
  1  runtime error
  2  bad arguments / usage

Examples:
  tsx src/index.ts --raw bundles/esx01.json --schema examples/vmware.json
  tsx src/index.ts --raw bundles/esx01.json --schemaDir examples --out out/esx01.json
`.trim();

async function readBundle(filePath: string): Promise<RawBundle> {
  const data: unknown = JSON.parse(await readFile(filePath, "utf-8"));
  if (!isRecord(data)) throw new Error(`Raw bundle ${filePath} must be a JSON object`);
  return data;
}

async function main(): Promise<void> {
  const projectRoot = process.env.INIT_CWD ?? process.cwd();
  const { hasFlag, getArg, assertNoUnknownOptions, assertHasValue, requireOneOf, requireArg } = makeArgvHelpers(
    process.argv,
    HELP_TEXT
  );

  if (hasFlag("--help", "-h")) {
    console.log(HELP_TEXT);
    return;
  }

  assertNoUnknownOptions(new Set(["--raw", "--schema", "--schemaDir", "--out", "--help", "-h"]));
  assertHasValue("--raw");
  assertHasValue("--schema");
  assertHasValue("--schemaDir");
  assertHasValue("--out");

  const rawPath = path.resolve(projectRoot, requireArg("--raw"));
  const schemaFlag = requireOneOf("--schema", "--schemaDir");
  const schemaArg = path.resolve(projectRoot, requireArg(schemaFlag));
  const outArg = getArg("--out");

  const deps = createNormalizerDeps({ cwd: projectRoot });
  const loaderDeps = { transforms: deps.transforms, logger };
  const bundle = await readBundle(rawPath);

  let output: NormalizedRecord | Record<string, NormalizedRecord>;
  if (schemaFlag === "--schema") {
    const schema = await loadSchemaFromFile(schemaArg, loaderDeps);
    output = normalizeFromSchema(schema, bundle, deps);
  } else {
    const schemas = await discoverSchemas([schemaArg], loaderDeps);
    const matched = detectSchemasForBundle(schemas.values(), bundle);
    if (!matched.length) {
      logger.warn(`No schema in ${schemaArg} matches ${rawPath}`, { schemas: [...schemas.keys()] });
    }
    output = Object.fromEntries(matched.map((s) => [s.name, normalizeFromSchema(s, bundle, deps)]));
  }

  const text = `${JSON.stringify(output, null, 2)}\n`;
  if (outArg) {
    const outPath = path.resolve(projectRoot, outArg);
    await mkdir(path.dirname(outPath), { recursive: true });
    await writeFile(outPath, text, "utf-8");
    logger.info(`normalized output: ${path.relative(projectRoot, outPath)}`);
  } else {
    process.stdout.write(text);
  }
}

main().catch((err: unknown) => {
  if (err instanceof CliUsageError) {
    console.error(err.message);
    process.exitCode = err.exitCode;
    return;
  }
  logger.error(err instanceof Error ? err.message : String(err), {
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exitCode = 1;
});
