// ---------------------------------------------------------------------------
// ResourceHandle – abstract base class shared by every Alma resource kind.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  ApiArea,
  ApiResponse,
  DataFormat,
  Document,
  Environment,
  HttpMethod,
  MutationKind,
  Permission,
  ResourceKind,
  ZoneCode,
} from "../../core/types.js";
import { ResourceStateError } from "../../core/errors.js";
import type { CredentialRegistry } from "../../config/credential-registry.js";
import type { RequestExecutor } from "../../http/request-executor.js";
import type { BackupStore } from "../../backup/backup-store.js";
import type {
  GuardedResource,
  GuardOptions,
  MutationGuard,
} from "../../guard/mutation-guard.js";
import { codecFor, type DocumentCodec } from "../../utils/documents.js";

/** Collaborators shared by every handle a client creates. */
export interface ResourceContext {
  registry: CredentialRegistry;
  executor: RequestExecutor;
  guard: MutationGuard;
  backups: BackupStore;
  logger: Logger;
}

export interface HandleOptions {
  zone: string;
  environment?: Environment;
  /** Pre-loaded document, e.g. the payload of a resource to create. */
  data?: Document;
}

/** A GET target: path plus optional query string parameters. */
export interface FetchTarget {
  path: string;
  query?: Record<string, string>;
}

/**
 * Abstract handle implementing the {@link GuardedResource} contract.
 * Concrete kinds provide their paths, their codec and how to read their
 * identifiers back out of a response.
 *
 * The base class provides:
 *   - Credential resolution for every call (read for GET, read-write else).
 *   - Guarded create / update / delete returning the handle for chaining.
 *   - A failure state that turns every later operation into a no-op.
 */
export abstract class ResourceHandle implements GuardedResource {
  public abstract readonly kind: ResourceKind;
  public abstract readonly area: ApiArea;
  public readonly format: DataFormat;
  public readonly zone: ZoneCode;
  public readonly environment: Environment;

  protected readonly ctx: ResourceContext;
  protected readonly codec: DocumentCodec;

  private document: Document | null;
  private fetchedPayload: string | null = null;
  private dirty = false;
  private failureState: { error: unknown } | null = null;
  private cachedLogger: Logger | null = null;

  constructor(ctx: ResourceContext, format: DataFormat, options: HandleOptions) {
    this.ctx = ctx;
    this.format = format;
    this.codec = codecFor(format);
    this.zone = ctx.registry.resolveZoneAlias(options.zone);
    this.environment = options.environment ?? "production";
    this.document = options.data ?? null;
  }

  // ── Identity (subclasses) ───────────────────────────────────────────────

  /** Remote identifier, `null` until the API has assigned one. */
  public abstract get resourceId(): string | null;

  /** Path of this resource; throws when identifiers are missing. */
  protected abstract resourcePath(): string;

  /** Path to POST to for a create, or `null` when the kind can't be created. */
  protected abstract collectionPath(): string | null;

  /** Pick identifiers out of a document returned by the API. */
  protected abstract adoptIdentity(doc: Document): void;

  /** Where a fetch reads from.  Defaults to {@link resourcePath}. */
  protected fetchTarget(): FetchTarget {
    return { path: this.resourcePath() };
  }

  /** Reduce a response to the single-resource document.  Identity by default. */
  protected unwrap(doc: Document): Document {
    return doc;
  }

  protected createQuery(): Record<string, string> | undefined {
    return undefined;
  }

  protected deleteQuery(): Record<string, string> | undefined {
    return undefined;
  }

  // ── State ───────────────────────────────────────────────────────────────

  get data(): Document | null {
    return this.document;
  }

  get failed(): boolean {
    return this.failureState !== null;
  }

  /** What made the handle fail, `null` while it is healthy. */
  get failure(): unknown {
    return this.failureState?.error ?? null;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get lastFetchedPayload(): string | null {
    return this.fetchedPayload;
  }

  markFailed(error: unknown): void {
    this.failureState = { error };
  }

  clearFailure(): void {
    this.failureState = null;
  }

  serialize(): string {
    if (this.document === null) {
      throw new ResourceStateError(`${this.describe()} has no data to serialize`);
    }
    return this.codec.serialize(this.document);
  }

  toString(): string {
    return this.document === null ? "" : this.codec.serialize(this.document);
  }

  /** Short label for log lines. */
  describe(): string {
    return `${this.kind}(${this.resourceId ?? "new"}, ${this.zone}, ${this.environment})`;
  }

  // ── Reads ───────────────────────────────────────────────────────────────

  /** Fetch the document unless it is already in memory. */
  async load(): Promise<this> {
    if (this.failed || this.document !== null) return this;
    return this.refresh();
  }

  /**
   * Re-fetch the document, discarding local edits.  Errors propagate; a
   * failed handle is returned untouched.
   */
  async refresh(): Promise<this> {
    if (this.skipIfFailed("refresh")) return this;
    const { path, query } = this.fetchTarget();
    const response = await this.send("GET", path, "read", { query });
    this.accept(response);
    this.logger.info(`${this.describe()}: data available`);
    return this;
  }

  async fetchRemotePayload(): Promise<string> {
    const { path, query } = this.fetchTarget();
    const response = await this.send("GET", path, "read", { query });
    return response.payload;
  }

  // ── Local edits ─────────────────────────────────────────────────────────

  /**
   * Apply `fn` to the in-memory document and flag it dirty.  An error thrown
   * by `fn` marks the handle failed.
   */
  edit(fn: (doc: Document) => void): this {
    if (this.skipIfFailed("edit")) return this;
    if (this.document === null) {
      this.markFailed(new ResourceStateError(`${this.describe()}: nothing loaded to edit`));
      this.logger.error(`${this.describe()}: edit failed, no data loaded`);
      return this;
    }
    try {
      fn(this.document);
    } catch (error: unknown) {
      this.markFailed(error);
      this.logger.error({ err: error }, `${this.describe()}: edit failed`);
      return this;
    }
    this.dirty = true;
    return this;
  }

  // ── Mutations ───────────────────────────────────────────────────────────

  async create(): Promise<this> {
    return this.guarded("create", async () => {
      const path = this.collectionPath();
      if (path === null) {
        throw new ResourceStateError(`${this.kind} resources cannot be created`);
      }
      const response = await this.send("POST", path, "read-write", {
        body: this.serialize(),
        query: this.createQuery(),
      });
      this.accept(response);
    });
  }

  async update(): Promise<this> {
    return this.guarded("update", async () => {
      const response = await this.send("PUT", this.resourcePath(), "read-write", {
        body: this.serialize(),
      });
      this.accept(response);
    });
  }

  async delete(): Promise<this> {
    return this.guarded("delete", () => this.deleteRemote());
  }

  /** Back up the in-memory document without touching the remote record. */
  async save(): Promise<this> {
    return this.ctx.guard.snapshot(this);
  }

  /**
   * Replace the in-memory document with the most recent local backup.  A
   * following {@link update} pushes it back to Alma.
   */
  async restoreFromBackup(): Promise<this> {
    if (this.skipIfFailed("restoreFromBackup")) return this;
    const id = this.resourceId;
    const record =
      id === null
        ? null
        : await this.ctx.backups.latest({
            kind: this.kind,
            zone: this.zone,
            environment: this.environment,
            resourceId: id,
          });
    if (record === null) {
      this.markFailed(new ResourceStateError(`${this.describe()}: no backup found`));
      this.logger.error(`${this.describe()}: no backup found`);
      return this;
    }
    this.document = this.unwrap(this.codec.parse(record.payload));
    this.dirty = true;
    this.logger.info(
      { backupTimestamp: record.timestamp.toISOString() },
      `${this.describe()}: data restored from backup`,
    );
    return this;
  }

  // ── Protected helpers ───────────────────────────────────────────────────

  protected get logger(): Logger {
    this.cachedLogger ??= this.ctx.logger.child({
      kind: this.kind,
      zone: this.zone,
      environment: this.environment,
    });
    return this.cachedLogger;
  }

  /** Resolve a key for this handle's zone and area, then execute. */
  protected async send(
    method: HttpMethod,
    path: string,
    permission: Permission,
    options: {
      body?: string;
      query?: Record<string, string>;
      format?: DataFormat;
    } = {},
  ): Promise<ApiResponse> {
    const credential = this.ctx.registry.resolve(
      this.zone,
      this.environment,
      this.area,
      permission,
    );
    return this.ctx.executor.execute({
      method,
      path,
      credential,
      format: options.format ?? this.format,
      query: options.query,
      body: options.body,
    });
  }

  /** GET a related document (lists, job instances) in `format`. */
  protected async fetchDocument(
    target: FetchTarget,
    format: DataFormat = this.format,
  ): Promise<Document> {
    const response = await this.send("GET", target.path, "read", {
      query: target.query,
      format,
    });
    return codecFor(format).parse(response.payload);
  }

  protected guarded(
    operation: MutationKind,
    commit: () => Promise<void>,
    options?: GuardOptions,
  ): Promise<this> {
    return this.ctx.guard.guard(operation, this, commit, options);
  }

  /** Mark `operation` as unsupported for this kind, under the guard's policy. */
  protected refuse(operation: MutationKind, message: string): Promise<this> {
    return this.ctx.guard.refuse(
      operation,
      this,
      new ResourceStateError(`${this.describe()}: ${message}`),
    );
  }

  /** The DELETE call itself, for subclasses that wrap it in a cascade. */
  protected async deleteRemote(): Promise<void> {
    await this.send("DELETE", this.resourcePath(), "read-write", {
      query: this.deleteQuery(),
    });
    this.dirty = false;
  }

  /** Take an API response body as the authoritative document. */
  protected accept(response: ApiResponse): void {
    if (response.payload.trim() === "") return;
    const doc = this.unwrap(this.codec.parse(response.payload));
    this.document = doc;
    this.fetchedPayload = response.payload;
    this.dirty = false;
    this.adoptIdentity(doc);
  }

  /** Read-side no-op guard: logs and reports whether to skip. */
  protected skipIfFailed(operation: string): boolean {
    if (!this.failed) return false;
    this.logger.error(
      { err: this.failure },
      `${this.describe()}: due to previous error, "${operation}" skipped`,
    );
    return true;
  }

  protected requireId(value: string | null, label: string): string {
    if (value === null || value === "") {
      throw new ResourceStateError(`${this.describe()}: missing ${label}`);
    }
    return encodeURIComponent(value);
  }
}
