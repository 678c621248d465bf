import { loadConfig } from "./config.js";
import { createLocalRepositoryResolver } from "./lib/artifact.js";
import { createCopyrightExtractor } from "./lib/extractor.js";
import { bundledFilterRules, loadFilterRulesFromFile } from "./lib/filters.js";
import { createLogger } from "./lib/logger.js";
import { buildApp } from "./app.js";

const config = loadConfig(process.env);
const logger = createLogger(config.LOG_LEVEL);

const rules = config.COPYRIGHT_FILTERS_FILE
  ? loadFilterRulesFromFile(config.COPYRIGHT_FILTERS_FILE, logger)
  : bundledFilterRules(logger);

const extractor = createCopyrightExtractor({
  resolver: createLocalRepositoryResolver(config.LOCAL_REPOSITORY),
  rules,
  logger,
  max_entry_bytes: config.INTAKE_MAX_SINGLE_FILE_BYTES
});

const app = buildApp({ config, extractor, rules, logger });
app.listen(config.PORT, () => {
  console.log(`Attribution extractor listening on ${config.BASE_URL} (repository ${config.LOCAL_REPOSITORY}, ${rules.patterns.length} filters)`);
});
