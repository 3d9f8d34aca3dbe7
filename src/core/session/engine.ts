/**
 * RegenerationSession: carries a model change through every affected file.
 *
 * Per-file work (parse, bind, generate, rewrite) is pure and never touches
 * the dependency index or the baselines. Those change only in the record
 * step that follows a file (regenerateFile) or a whole pass (regenerate),
 * so every rewrite of a pass sees the same state.
 */
import type { BaselineStore } from '../baselines/types.js';
import { MemoryBaselineStore } from '../baselines/memory-store.js';
import type { MarkerCatalog } from '../catalog/catalog.js';
import { ConflictReporter } from '../conflicts/reporter.js';
import { resolveConflict, type ResolvedConflict } from '../conflicts/resolution.js';
import type { Conflict, ConflictResolution } from '../conflicts/types.js';
import { changedKeysBetween } from '../dependencies/changes.js';
import { DependencyTracker } from '../dependencies/tracker.js';
import type { DependencyStore } from '../dependencies/types.js';
import { conditionSyntaxError } from '../generator/conditions.js';
import { ContentGenerator } from '../generator/content-generator.js';
import { markerDependencies } from '../generator/dependencies.js';
import type { ModelSnapshot } from '../generator/model.js';
import type { GenerationError } from '../generator/types.js';
import { LanguageRegistry } from '../languages/registry.js';
import { parseDocument, regionsOf } from '../markers/parser.js';
import type { BoundDocument, MarkerId } from '../markers/types.js';
import { bindDocument, selectAffected } from '../rewriter/bind.js';
import { rewriteDocument } from '../rewriter/rewriter.js';
import { ErrorCodes, ParseFailure } from '../../utils/errors.js';
import { Logger, logger as sharedLogger } from '../../utils/logger.js';
import type { SourceProvider } from './provider.js';
import type { FileFailure, FileOutcome, IndexResult, RegenerationReport } from './types.js';

export type ChangedKeys = Iterable<string> | 'all';

export interface RegenerationSessionOptions {
  catalog: MarkerCatalog;
  tracker?: DependencyTracker;
  baselines?: BaselineStore;
  /** Persists dependency triples after each record step */
  dependencyStore?: DependencyStore;
  languages?: LanguageRegistry;
  generator?: ContentGenerator;
  reindentGuards?: boolean;
  logger?: Logger;
}

export interface RegenerateOptions {
  /** Checked between files; a file in progress always completes */
  signal?: AbortSignal;
  /** Write updated files through the provider (default true) */
  write?: boolean;
}

/**
 * What the record step applies for one file.
 */
type PendingRecord =
  | { type: 'update'; file: string; document: BoundDocument; baselines: Map<MarkerId, string>; conflicts: Conflict[] }
  | { type: 'remove'; file: string };

interface FilePass {
  outcome: FileOutcome;
  record?: PendingRecord;
}

function failedOutcome(file: string, text: string, failure: FileFailure): FileOutcome {
  return { file, status: 'error', text, conflicts: [], errors: [], regenerated: [], seeded: [], failure };
}

export class RegenerationSession {
  readonly catalog: MarkerCatalog;
  readonly tracker: DependencyTracker;
  readonly baselines: BaselineStore;
  readonly languages: LanguageRegistry;
  readonly generator: ContentGenerator;
  readonly conflicts = new ConflictReporter();
  private readonly dependencyStore?: DependencyStore;
  private readonly reindentGuards: boolean;
  private readonly log: Logger;
  private lastModel?: ModelSnapshot;

  constructor(options: RegenerationSessionOptions) {
    this.catalog = options.catalog;
    this.tracker = options.tracker ?? new DependencyTracker();
    this.baselines = options.baselines ?? new MemoryBaselineStore();
    this.dependencyStore = options.dependencyStore;
    this.languages = options.languages ?? new LanguageRegistry();
    this.generator = options.generator ?? new ContentGenerator();
    this.reindentGuards = options.reindentGuards ?? true;
    this.log = options.logger ?? sharedLogger.child('session');
  }

  /**
   * Reload the dependency index from the persistent store, if any.
   */
  restore(): number {
    if (!this.dependencyStore) return 0;
    const triples = this.dependencyStore.all();
    this.tracker.load(triples);
    this.log.debug(`Restored ${triples.length} dependency entries for ${this.tracker.files().length} files`);
    return triples.length;
  }

  /**
   * Parse a file and record its markers' dependencies without generating.
   * Markers seen for the first time adopt their current body as baseline.
   */
  indexFile(file: string, text: string): IndexResult {
    const bound = this.parseAndBind(file, text);
    if (!bound.ok) {
      this.log.error(`${file}: ${bound.failure.message}`);
      return { file, markers: [], errors: [], failure: bound.failure };
    }

    const markers: MarkerId[] = [];
    const errors: GenerationError[] = [];
    this.tracker.forgetFile(file);
    for (const region of regionsOf(bound.document)) {
      if (!region.marker || region.marker.kind === 'guard') continue;
      if (region.marker.kind === 'conditional') {
        const syntaxError = conditionSyntaxError(region.marker.condition);
        if (syntaxError !== undefined) {
          errors.push({
            file,
            markerId: region.id,
            kind: 'conditional',
            code: 'UNEVALUABLE_CONDITION',
            message: syntaxError,
          });
          this.log.warn(`${file}: UNEVALUABLE_CONDITION in <conditional:${region.id}>: ${syntaxError}`);
        }
      }
      this.tracker.record(file, region.id, markerDependencies(region.marker));
      if (!region.hasBaseline) this.baselines.set(file, region.id, region.rawContent);
      markers.push(region.id);
    }
    this.dependencyStore?.replaceForFile(file, this.tracker.triples(file));
    this.log.debug(`Indexed ${file}`, { markers });
    return { file, markers, errors };
  }

  /**
   * Index every file the provider lists whose extension has a language profile.
   */
  async indexAll(provider: SourceProvider): Promise<IndexResult[]> {
    const results: IndexResult[] = [];
    for (const file of await provider.list()) {
      if (!this.languages.profileForPath(file)) continue;
      const text = await provider.read(file);
      if (text === undefined) continue;
      results.push(this.indexFile(file, text));
    }
    return results;
  }

  /**
   * Rewrite one file and record its new state. With 'all', every
   * generating marker is regenerated regardless of dependencies.
   */
  regenerateFile(file: string, text: string, model: ModelSnapshot, changedKeys: ChangedKeys): FileOutcome {
    const pass = this.rewriteFile(file, text, model, changedKeys);
    if (pass.record) this.record([pass.record]);
    return pass.outcome;
  }

  /**
   * Rewrite every file the index says is affected by the changed keys, then
   * record the whole pass in one step.
   */
  async regenerate(
    model: ModelSnapshot,
    changedKeys: ChangedKeys,
    provider: SourceProvider,
    options: RegenerateOptions = {}
  ): Promise<RegenerationReport> {
    const keys = changedKeys === 'all' ? 'all' : [...changedKeys];
    const view = this.tracker.snapshot();
    const files = keys === 'all' ? view.files() : view.affectedFiles(keys);
    const write = options.write ?? true;

    const report: RegenerationReport = {
      files: [],
      updated: [],
      unchanged: [],
      failed: [],
      conflicts: [],
      errors: [],
      cancelled: false,
    };
    const pending: PendingRecord[] = [];

    this.log.info(`Regenerating ${files.length} affected file${files.length === 1 ? '' : 's'}`);

    for (const file of files) {
      if (options.signal?.aborted) {
        report.cancelled = true;
        this.log.warn(`Cancelled before ${file}`);
        break;
      }

      const text = await provider.read(file);
      if (text === undefined) {
        const failure: FileFailure = { code: 'MISSING_FILE', message: `${file} no longer exists` };
        this.log.warn(failure.message);
        report.files.push(failedOutcome(file, '', failure));
        report.failed.push(file);
        pending.push({ type: 'remove', file });
        continue;
      }

      const pass = this.rewriteFile(file, text, model, keys);
      const { outcome } = pass;
      if (outcome.status === 'updated' && write) {
        await provider.write(file, outcome.text);
      }
      if (pass.record) pending.push(pass.record);

      report.files.push(outcome);
      if (outcome.status === 'updated') report.updated.push(file);
      else if (outcome.status === 'unchanged') report.unchanged.push(file);
      else report.failed.push(file);
      report.conflicts.push(...outcome.conflicts);
      report.errors.push(...outcome.errors);
    }

    this.record(pending);

    if (report.conflicts.length > 0 || report.errors.length > 0) {
      this.log.warn(
        `${report.conflicts.length} conflict(s), ${report.errors.length} generation error(s)`
      );
    }
    this.log.info(
      `Updated ${report.updated.length}, unchanged ${report.unchanged.length}, failed ${report.failed.length}`
    );
    return report;
  }

  /**
   * Regenerate from a full model snapshot, deriving the changed keys from the
   * previous snapshot this method saw. The first call regenerates everything.
   */
  async applyModel(
    model: ModelSnapshot,
    provider: SourceProvider,
    options: RegenerateOptions = {}
  ): Promise<RegenerationReport> {
    const changedKeys = this.lastModel ? changedKeysBetween(this.lastModel, model) : 'all';
    const report = await this.regenerate(model, changedKeys, provider, options);
    if (!report.cancelled) this.lastModel = model;
    return report;
  }

  /**
   * Apply the caller's decision for a conflict and record the new baseline.
   */
  acceptResolution(
    text: string,
    conflict: Conflict,
    resolution: ConflictResolution
  ): ResolvedConflict {
    const file = conflict.file;
    if (file === undefined) {
      throw new ParseFailure(
        ErrorCodes.UNRESOLVABLE_FILE,
        `Conflict on '${conflict.markerId}' is not tied to a file`,
        { markerId: conflict.markerId }
      );
    }
    const profile = this.languages.profileForPath(file);
    if (!profile) {
      throw new ParseFailure(ErrorCodes.UNRESOLVABLE_FILE, `No language profile for ${file}`, { file });
    }

    const resolved = resolveConflict(text, profile, conflict, resolution);
    this.baselines.set(file, conflict.markerId, resolved.baseline);
    this.conflicts.remove(file, conflict.markerId);
    this.log.debug(`Resolved ${file}#${conflict.markerId}`);
    return resolved;
  }

  private parseAndBind(
    file: string,
    text: string
  ): { ok: true; document: BoundDocument } | { ok: false; failure: FileFailure } {
    const profile = this.languages.profileForPath(file);
    if (!profile) {
      return { ok: false, failure: { code: 'UNKNOWN_LANGUAGE', message: `No language profile for ${file}` } };
    }
    const parsed = parseDocument(text, profile, file);
    if (!parsed.success) {
      return {
        ok: false,
        failure: {
          code: 'PARSE_ERROR',
          message: `line ${parsed.error.line}: ${parsed.error.message}`,
          parseError: parsed.error,
        },
      };
    }
    return { ok: true, document: bindDocument(parsed.document, { catalog: this.catalog, baselines: this.baselines }) };
  }

  private rewriteFile(file: string, text: string, model: ModelSnapshot, changedKeys: ChangedKeys): FilePass {
    const bound = this.parseAndBind(file, text);
    if (!bound.ok) {
      this.log.error(`${file}: ${bound.failure.message}`);
      return { outcome: failedOutcome(file, text, bound.failure) };
    }

    const { document } = bound;
    const affected = changedKeys === 'all' ? 'all' : selectAffected(document, changedKeys);
    if (affected !== 'all' && affected.size === 0) {
      this.log.debug(`${file}: no affected markers`);
      return {
        outcome: { file, status: 'unchanged', text, conflicts: [], errors: [], regenerated: [], seeded: [] },
      };
    }

    const result = rewriteDocument(document, {
      model,
      affected,
      generator: this.generator,
      reindentGuards: this.reindentGuards,
    });

    for (const conflict of result.conflicts) {
      this.log.warn(`${file}: conflict in <${conflict.kind}:${conflict.markerId}> (${conflict.reason})`);
    }
    for (const error of result.errors) {
      this.log.warn(`${file}: ${error.code} in <${error.kind}:${error.markerId}>: ${error.message}`);
    }
    this.log.debug(`${file}: ${result.changed ? 'updated' : 'unchanged'}`, {
      regenerated: result.regenerated,
      seeded: result.seeded,
    });

    return {
      outcome: {
        file,
        status: result.changed ? 'updated' : 'unchanged',
        text: result.text,
        conflicts: result.conflicts,
        errors: result.errors,
        regenerated: result.regenerated,
        seeded: result.seeded,
      },
      record: { type: 'update', file, document, baselines: result.baselines, conflicts: result.conflicts },
    };
  }

  /**
   * The single writer of the dependency index, baselines and conflict list.
   */
  private record(pending: ReadonlyArray<PendingRecord>): void {
    for (const entry of pending) {
      const { file } = entry;
      this.tracker.forgetFile(file);
      this.conflicts.clearFile(file);

      if (entry.type === 'remove') {
        this.baselines.retain(file, []);
        this.dependencyStore?.deleteFile(file);
        continue;
      }

      for (const region of regionsOf(entry.document)) {
        if (region.marker && region.marker.kind !== 'guard') {
          this.tracker.record(file, region.id, markerDependencies(region.marker));
        }
      }
      for (const [markerId, content] of entry.baselines) {
        this.baselines.set(file, markerId, content);
      }
      this.baselines.retain(file, entry.baselines.keys());
      this.conflicts.addAll(entry.conflicts);
      this.dependencyStore?.replaceForFile(file, this.tracker.triples(file));
    }
  }
}
