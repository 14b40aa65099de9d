// ---------------------------------------------------------------------------
// Job – scheduled, manual or other job under /conf/jobs.
//
// Jobs are addressed by type letter plus id (e.g. M12345).  They cannot be
// created, updated or deleted through the API; they can be run, and their
// instances inspected.
// ---------------------------------------------------------------------------

import type { Document } from "../../core/types.js";
import { ResourceStateError } from "../../core/errors.js";
import { ResourceHandle, type HandleOptions, type ResourceContext } from "../base/resource-handle.js";
import { getIn, readText } from "../../utils/documents.js";

/** M: manual, S: scheduled, O: other. */
export type JobType = "M" | "S" | "O";

export interface JobOptions extends HandleOptions {
  jobId: string;
  jobType?: JobType;
}

export interface JobInstanceState {
  status: string | null;
  progress: number | null;
}

export class Job extends ResourceHandle {
  public readonly kind = "job";
  public readonly area = "Conf";
  public readonly jobId: string;
  public readonly jobType: JobType;

  private lastInstanceId: string | null = null;
  private lastRun: Document | null = null;

  constructor(ctx: ResourceContext, options: JobOptions) {
    super(ctx, "json", options);
    this.jobId = options.jobId;
    this.jobType = options.jobType ?? "M";
  }

  get resourceId(): string {
    return `${this.jobType}${this.jobId}`;
  }

  /** Instance started by the last successful {@link run}. */
  get instanceId(): string | null {
    return this.lastInstanceId;
  }

  /** Response body of the last successful {@link run}. */
  get lastRunResult(): Document | null {
    return this.lastRun;
  }

  protected resourcePath(): string {
    return `/conf/jobs/${this.requireId(this.resourceId, "job ID")}`;
  }

  protected collectionPath(): null {
    return null;
  }

  protected adoptIdentity(): void {
    // Identity is fixed at construction.
  }

  /** Jobs cannot be created through the API; marks the handle failed. */
  async create(): Promise<this> {
    return this.refuse("create", "Jobs cannot be created through the API");
  }

  /** Jobs cannot be updated through the API; marks the handle failed. */
  async update(): Promise<this> {
    return this.refuse("update", "Jobs cannot be updated through the API");
  }

  /** Jobs cannot be deleted through the API; marks the handle failed. */
  async delete(): Promise<this> {
    return this.refuse("delete", "Jobs cannot be deleted through the API");
  }

  /**
   * Start the job.  Guarded like a create: the parameters are backed up
   * before the request, and a failure marks the handle failed.
   */
  async run(parameters: Document = {}): Promise<this> {
    const body = JSON.stringify(parameters);
    return this.guarded(
      "create",
      async () => {
        const response = await this.send("POST", this.resourcePath(), "read-write", {
          body,
          query: { op: "run" },
        });
        const result = this.codec.parse(response.payload);
        const link = readText(result, ["additional_info", "link"]);
        const instanceId = link?.split("/").filter((s) => s !== "").pop() ?? null;
        if (instanceId === null) {
          throw new ResourceStateError(`${this.describe()}: run response has no instance link`);
        }
        this.lastRun = result;
        this.lastInstanceId = instanceId;
        this.logger.info({ instanceId }, `${this.describe()}: job started`);
      },
      { backupPayload: body },
    );
  }

  /** List of the job's instances, `null` on a failed handle. */
  async getInstances(): Promise<Document | null> {
    if (this.skipIfFailed("getInstances")) return null;
    return this.fetchDocument({ path: `${this.resourcePath()}/instances` });
  }

  /** Details of one instance, by default the one started by {@link run}. */
  async getInstanceInfo(instanceId?: string): Promise<Document | null> {
    if (this.skipIfFailed("getInstanceInfo")) return null;
    const id = this.requireId(instanceId ?? this.lastInstanceId, "instance ID");
    return this.fetchDocument({ path: `${this.resourcePath()}/instances/${id}` });
  }

  async checkInstanceState(instanceId?: string): Promise<JobInstanceState | null> {
    const info = await this.getInstanceInfo(instanceId);
    if (info === null) return null;
    const progress = getIn(info, ["progress"]);
    return {
      status: readText(info, ["status", "value"]),
      progress: typeof progress === "number" ? progress : null,
    };
  }
}
