/* eslint-disable prefer-top-level-await */
import { loadConfig } from "../../src/config/env";
import { createDefaultRegistry } from "../../src/data/registry";
import { isSourceName } from "../../src/types";
import { AxiosProviderHttp } from "../../src/utils";

async function main() {
  const [sourceArg, ...questionParts] = process.argv.slice(2);
  const question = questionParts.join(" ").replace(/^"+/, "").replace(/"+$/, "").trim();

  if (!isSourceName(sourceArg) || !question) {
    console.error("Usage: tsx scripts/manual/askSource.ts <wolfram|google|duckduckgo|wikipedia|arxiv|dbpedia|youtube> <question>");
    process.exit(1);
  }

  const config = loadConfig();
  const registry = createDefaultRegistry(config.credentials, new AxiosProviderHttp());
  const adapter = registry.get(sourceArg);
  if (!adapter) {
    console.error(`Source ${sourceArg} is not registered`);
    process.exit(1);
  }

  const startedAt = Date.now();
  const text = await adapter.fetch(question, config.fanout.perSourceTimeoutSeconds);
  console.log(JSON.stringify({ source: sourceArg, elapsedMs: Date.now() - startedAt, text }, null, 2));
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
