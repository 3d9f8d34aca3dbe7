/**
 * Build a session from `.markwright/config.yaml` and the marker catalog.
 */
import * as path from 'node:path';
import type Database from 'better-sqlite3';
import { MemoryBaselineStore } from '../baselines/memory-store.js';
import { MarkerCatalog } from '../catalog/catalog.js';
import { loadCatalog } from '../catalog/loader.js';
import { loadConfig, toLanguageProfiles } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { SqliteBaselineStore } from '../db/baseline-store.js';
import { closeStateDb, openStateDb } from '../db/manager.js';
import { DependencyRepository } from '../db/repositories/dependencies.js';
import { ContentGenerator } from '../generator/content-generator.js';
import { GeneratorRegistry } from '../generator/registry.js';
import type { TemplateRenderer } from '../generator/template-renderer.js';
import { LanguageRegistry } from '../languages/registry.js';
import { fileExists } from '../../utils/file-system.js';
import { Logger } from '../../utils/logger.js';
import { RegenerationSession } from './engine.js';
import { NodeSourceProvider } from './provider.js';

export interface SessionFactoryOptions {
  /** Already loaded configuration; read from the project when omitted */
  config?: Config;
  configPath?: string;
  registry?: GeneratorRegistry;
  renderer?: TemplateRenderer;
  logger?: Logger;
}

export interface ProjectSession {
  session: RegenerationSession;
  provider: NodeSourceProvider;
  config: Config;
  /** Release the state database, if one was opened */
  close(): void;
}

export async function createSessionFromConfig(
  projectRoot: string,
  options: SessionFactoryOptions = {}
): Promise<ProjectSession> {
  const config = options.config ?? (await loadConfig(projectRoot, options.configPath));
  const logger = options.logger ?? new Logger({ level: config.logging.level, prefix: 'markwright' });

  const catalogPath = path.resolve(projectRoot, config.catalog.path);
  let catalog: MarkerCatalog;
  if (await fileExists(catalogPath)) {
    catalog = await loadCatalog(catalogPath);
    logger.debug(`Loaded ${catalog.size()} marker definitions from ${config.catalog.path}`);
  } else {
    catalog = new MarkerCatalog();
    logger.warn(`No marker catalog at ${config.catalog.path}; only guards will be recognised`);
  }

  const generator = new ContentGenerator({
    registry: options.registry,
    renderer: options.renderer,
    templateSeparator: config.generation.template_separator,
    importSort: config.generation.import_sort,
  });

  let db: Database.Database | undefined;
  if (config.state.persist) {
    db = openStateDb(path.resolve(projectRoot, config.state.path));
  }

  const session = new RegenerationSession({
    catalog,
    generator,
    languages: new LanguageRegistry(toLanguageProfiles(config.languages)),
    baselines: db ? new SqliteBaselineStore(db) : new MemoryBaselineStore(),
    dependencyStore: db ? new DependencyRepository(db) : undefined,
    reindentGuards: config.generation.reindent_guards,
    logger: logger.child('session'),
  });
  session.restore();

  return {
    session,
    provider: new NodeSourceProvider(projectRoot, {
      include: config.scan.include,
      exclude: config.scan.exclude,
    }),
    config,
    close: () => {
      if (db) closeStateDb(db);
    },
  };
}
