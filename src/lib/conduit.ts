import { createHash } from "crypto";
import * as v from "valibot";
import type {
  ConduitChange,
  RemoteGraphNode,
  RemoteIdentity,
  RevisionContent,
  RevisionStatus,
  TransformedDiff,
} from "./stackTypes.js";
import { ConduitAPIError, StackError, toError } from "./errors.js";
import { logger } from "./logger.js";

export const CONTENT_HASH_PROPERTY = "phab-stack:content-hash";

export interface UpdateOptions {
  comment: string | null;
  includeDiff: boolean; // false when only title, summary or status change
}

export interface ConduitUser {
  phid: string;
  userName: string;
  realName: string;
}

export type ReviewerProblem =
  | { name: string; kind: "unknown" | "disabled" }
  | { name: string; kind: "away"; until: string | null };

// Types for dependency injection
export type ReviewServer = {
  url: string;
  get: (
    identities: RemoteIdentity[],
  ) => Promise<Map<RemoteIdentity, RemoteGraphNode>>;
  create: (
    content: RevisionContent,
    parent: RemoteIdentity | null,
  ) => Promise<RemoteIdentity>;
  update: (
    identity: RemoteIdentity,
    content: RevisionContent,
    parent: RemoteIdentity | null,
    options: UpdateOptions,
  ) => Promise<void>;
  setParent: (
    identity: RemoteIdentity,
    parent: RemoteIdentity | null,
  ) => Promise<void>;
  checkReviewers: (reviewers: string[]) => Promise<ReviewerProblem[]>;
  ping: () => Promise<void>;
  whoami: () => Promise<ConduitUser>;
};

export type FetchFunction = (
  input: string | URL,
  init: { method: string; headers: Record<string, string>; body: string },
) => Promise<{ ok: boolean; status: number; json: () => Promise<unknown> }>;

export interface ConduitConfig {
  url: string; // Phabricator base URL, e.g. https://phabricator.example.com/
  token: string;
  callsign: string | null;
  vcs: "git" | "jj";
  sourcePath: string;
  fetch?: FetchFunction;
}

const ConduitResponseSchema = v.object({
  result: v.unknown(),
  error_code: v.nullish(v.string()),
  error_info: v.nullish(v.string()),
});

const RevisionSearchSchema = v.object({
  data: v.array(
    v.object({
      id: v.number(),
      phid: v.string(),
      fields: v.object({
        title: v.string(),
        summary: v.string(),
        status: v.object({ value: v.string(), closed: v.boolean() }),
        diffPHID: v.nullish(v.string()),
        "bugzilla.bug-id": v.nullish(v.union([v.string(), v.number()])),
      }),
      attachments: v.optional(
        v.object({
          reviewers: v.optional(
            v.object({ reviewers: v.array(v.unknown()) }),
          ),
        }),
      ),
    }),
  ),
});
type RevisionData = v.InferOutput<typeof RevisionSearchSchema>["data"][number];

const EdgeSearchSchema = v.object({
  data: v.array(
    v.object({ sourcePHID: v.string(), destinationPHID: v.string() }),
  ),
});

const DiffSearchSchema = v.object({
  data: v.array(v.object({ id: v.number(), phid: v.string() })),
});

// AIDEV-NOTE: PHP encodes an empty properties map as []
const QueryDiffsSchema = v.union([
  v.record(
    v.string(),
    v.object({
      properties: v.union([
        v.record(v.string(), v.unknown()),
        v.array(v.unknown()),
      ]),
    }),
  ),
  v.array(v.unknown()),
]);

const CreateDiffSchema = v.object({ diffid: v.number(), phid: v.string() });

const RevisionEditSchema = v.object({
  object: v.object({ id: v.number(), phid: v.string() }),
});

const FileAllocateSchema = v.object({
  upload: v.boolean(),
  filePHID: v.nullish(v.string()),
});

const FileChunksSchema = v.array(
  v.object({
    byteStart: v.union([v.string(), v.number()]),
    byteEnd: v.union([v.string(), v.number()]),
    complete: v.boolean(),
  }),
);

const UserSearchSchema = v.object({
  data: v.array(
    v.object({
      phid: v.string(),
      fields: v.object({
        username: v.string(),
        roles: v.optional(v.array(v.string()), []),
      }),
      attachments: v.optional(
        v.object({
          availability: v.optional(
            v.object({ value: v.string(), until: v.nullish(v.number()) }),
          ),
        }),
      ),
    }),
  ),
});
type UserData = v.InferOutput<typeof UserSearchSchema>["data"][number];

const ProjectSearchSchema = v.object({
  data: v.array(
    v.object({ phid: v.string(), fields: v.object({ slug: v.string() }) }),
  ),
  maps: v.optional(
    v.object({
      slugMap: v.union([
        v.record(v.string(), v.object({ projectPHID: v.string() })),
        v.array(v.unknown()),
      ]),
    }),
  ),
});

const RepositorySearchSchema = v.object({
  data: v.array(v.object({ phid: v.string() })),
});

const WhoamiSchema = v.object({
  phid: v.string(),
  userName: v.string(),
  realName: v.string(),
});

type Transaction = { type: string; value: unknown };

function toStatus(status: {
  value: string;
  closed: boolean;
}): RevisionStatus {
  if (status.value === "abandoned") return "abandoned";
  return status.closed ? "closed" : "open";
}

function bugIdOf(revision: RevisionData): string | null {
  const value = revision.fields["bugzilla.bug-id"];
  return value === null || value === undefined || value === ""
    ? null
    : String(value);
}

function hasReviewers(revision: RevisionData): boolean {
  return (revision.attachments?.reviewers?.reviewers.length ?? 0) > 0;
}

interface ReviewerName {
  name: string; // Without "#" and "!"
  group: boolean;
  blocking: boolean;
}

function parseReviewerNames(reviewers: string[]): ReviewerName[] {
  return reviewers.map((r) => ({
    name: r.replace(/!+$/, "").replace(/^#/, ""),
    group: r.startsWith("#"),
    blocking: r.endsWith("!"),
  }));
}

function label({ name, group }: ReviewerName): string {
  return `${group ? "#" : ""}${name}`;
}

/**
 * Create a ReviewServer that talks to Phabricator's Conduit API
 */
export function createConduitServer(config: ConduitConfig): ReviewServer {
  const client = new ConduitClient(config);
  return {
    url: config.url,
    get: (identities) => client.getNodes(identities),
    create: (content, parent) => client.createRevision(content, parent),
    update: (identity, content, parent, options) =>
      client.updateRevision(identity, content, parent, options),
    setParent: (identity, parent) => client.setParent(identity, parent),
    checkReviewers: (reviewers) => client.checkReviewers(reviewers),
    ping: () => client.ping(),
    whoami: () => client.whoami(),
  };
}

export class ConduitClient {
  private readonly apiUrl: URL;
  private readonly fetchImpl: FetchFunction;
  private readonly phids = new Map<RemoteIdentity, string>();
  private repositoryPhid: Promise<string | null> | null = null;

  constructor(private readonly config: ConduitConfig) {
    this.apiUrl = new URL(
      "api/",
      config.url.endsWith("/") ? config.url : `${config.url}/`,
    );
    this.fetchImpl = config.fetch ?? fetch;
  }

  /**
   * Call a Conduit method and validate its result
   */
  async call<TSchema extends v.GenericSchema>(
    method: string,
    params: Record<string, unknown>,
    schema: TSchema,
  ): Promise<v.InferOutput<TSchema>> {
    logger.debug(`conduit ${method}`, params);
    const body = new URLSearchParams({
      params: JSON.stringify({
        ...params,
        __conduit__: { token: this.config.token },
      }),
      output: "json",
      __conduit__: "true",
    });
    const response = await this.fetchImpl(new URL(method, this.apiUrl), {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        "User-Agent": "phab-stack",
      },
      body: body.toString(),
    });
    if (!response.ok) {
      throw new ConduitAPIError(method, `HTTP ${response.status}`);
    }

    const payload = v.parse(ConduitResponseSchema, await response.json());
    if (payload.error_code) {
      throw new ConduitAPIError(
        method,
        payload.error_info ?? `Error ${payload.error_code}`,
      );
    }
    try {
      return v.parse(schema, payload.result);
    } catch (error) {
      throw new ConduitAPIError(
        method,
        `unexpected response: ${toError(error).message}`,
      );
    }
  }

  async ping(): Promise<void> {
    await this.call("conduit.ping", {}, v.unknown());
  }

  whoami(): Promise<ConduitUser> {
    return this.call("user.whoami", {}, WhoamiSchema);
  }

  private async searchRevisions(
    constraint: "ids" | "phids",
    values: Array<number | string>,
  ): Promise<RevisionData[]> {
    if (!values.length) return [];
    const { data } = await this.call(
      "differential.revision.search",
      {
        constraints: { [constraint]: values },
        attachments: { reviewers: true },
      },
      RevisionSearchSchema,
    );
    for (const revision of data) {
      this.phids.set(revision.id, revision.phid);
    }
    return data;
  }

  private async revisionByIdentity(
    identity: RemoteIdentity,
  ): Promise<RevisionData> {
    const [revision] = await this.searchRevisions("ids", [identity]);
    if (!revision) {
      throw new ConduitAPIError(
        "differential.revision.search",
        `D${identity} not found`,
      );
    }
    return revision;
  }

  private async phidFor(identity: RemoteIdentity): Promise<string> {
    return (
      this.phids.get(identity) ??
      (await this.revisionByIdentity(identity)).phid
    );
  }

  /**
   * Parent identities of each revision, from revision.parent edges
   */
  private async parentsOf(
    revisions: RevisionData[],
  ): Promise<Map<string, RemoteIdentity[]>> {
    if (!revisions.length) return new Map();
    const { data } = await this.call(
      "edge.search",
      { sourcePHIDs: revisions.map((r) => r.phid), types: ["revision.parent"] },
      EdgeSearchSchema,
    );
    const idsByPhid = new Map(revisions.map((r) => [r.phid, r.id]));
    const unknown = [...new Set(data.map((e) => e.destinationPHID))].filter(
      (phid) => !idsByPhid.has(phid),
    );
    for (const revision of await this.searchRevisions("phids", unknown)) {
      idsByPhid.set(revision.phid, revision.id);
    }

    const parents = new Map<string, RemoteIdentity[]>();
    for (const edge of data) {
      const parent = idsByPhid.get(edge.destinationPHID);
      if (parent === undefined) continue;
      const known = parents.get(edge.sourcePHID) ?? [];
      if (!known.includes(parent)) known.push(parent);
      parents.set(edge.sourcePHID, known);
    }
    return parents;
  }

  /**
   * Content hash stored on each active diff, keyed by diff PHID
   */
  private async contentHashes(
    revisions: RevisionData[],
  ): Promise<Map<string, string>> {
    const diffPhids = revisions.flatMap((r) =>
      r.fields.diffPHID ? [r.fields.diffPHID] : [],
    );
    if (!diffPhids.length) return new Map();

    const { data: diffs } = await this.call(
      "differential.diff.search",
      { constraints: { phids: diffPhids } },
      DiffSearchSchema,
    );
    if (!diffs.length) return new Map();
    const queried = await this.call(
      "differential.querydiffs",
      { ids: diffs.map((d) => d.id) },
      QueryDiffsSchema,
    );
    if (Array.isArray(queried)) return new Map();

    const hashes = new Map<string, string>();
    for (const diff of diffs) {
      const properties = queried[String(diff.id)]?.properties;
      if (!properties || Array.isArray(properties)) continue;
      const hash = properties[CONTENT_HASH_PROPERTY];
      if (typeof hash === "string") {
        hashes.set(diff.phid, hash);
      }
    }
    return hashes;
  }

  /**
   * Fetch the graph nodes for `identities`. Identities the server doesn't
   * return are missing from the map.
   */
  async getNodes(
    identities: RemoteIdentity[],
  ): Promise<Map<RemoteIdentity, RemoteGraphNode>> {
    const revisions = await this.searchRevisions("ids", [
      ...new Set(identities),
    ]);
    const [parents, hashes] = await Promise.all([
      this.parentsOf(revisions),
      this.contentHashes(revisions),
    ]);

    const nodes = new Map<RemoteIdentity, RemoteGraphNode>();
    for (const revision of revisions) {
      const { diffPHID } = revision.fields;
      nodes.set(revision.id, {
        identity: revision.id,
        phid: revision.phid,
        parents: parents.get(revision.phid) ?? [],
        diffHash: diffPHID ? (hashes.get(diffPHID) ?? null) : null,
        status: toStatus(revision.fields.status),
        reviewStatus: revision.fields.status.value,
        hasReviewers: hasReviewers(revision),
        bugId: bugIdOf(revision),
        title: revision.fields.title,
        summary: revision.fields.summary,
      });
    }
    return nodes;
  }

  private getRepositoryPhid(): Promise<string | null> {
    const callsign = this.config.callsign;
    if (!callsign) return Promise.resolve(null);
    this.repositoryPhid ??= this.call(
      "diffusion.repository.search",
      { constraints: { callsigns: [callsign] }, limit: 1 },
      RepositorySearchSchema,
    ).then(({ data }) => {
      if (!data.length) {
        throw new StackError(`Repository with callsign ${callsign} not found`);
      }
      return data[0].phid;
    });
    return this.repositoryPhid;
  }

  async uploadFile(bytes: Buffer, name: string): Promise<string> {
    const allocation = await this.call(
      "file.allocate",
      {
        name,
        contentLength: bytes.length,
        contentHash: createHash("sha256").update(bytes).digest("hex"),
      },
      FileAllocateSchema,
    );
    let filePhid = allocation.filePHID ?? null;

    if (allocation.upload) {
      if (!filePhid) {
        filePhid = await this.call(
          "file.upload",
          { data_base64: bytes.toString("base64"), name },
          v.string(),
        );
      } else {
        const chunks = await this.call(
          "file.querychunks",
          { filePHID: filePhid },
          FileChunksSchema,
        );
        for (const chunk of chunks) {
          if (chunk.complete) continue;
          const byteStart = Number(chunk.byteStart);
          await this.call(
            "file.uploadchunk",
            {
              filePHID: filePhid,
              byteStart,
              data: bytes
                .subarray(byteStart, Number(chunk.byteEnd))
                .toString("base64"),
              dataEncoding: "base64",
            },
            v.unknown(),
          );
        }
      }
    }
    if (!filePhid) {
      throw new ConduitAPIError("file.allocate", `no file PHID for ${name}`);
    }
    return filePhid;
  }

  /**
   * Upload binaries, create the diff and tag it with its content hash
   */
  async createDiff(diff: TransformedDiff): Promise<string> {
    const uploaded = await Promise.all(
      diff.uploads.map(async (upload) => ({
        upload,
        phid: await this.uploadFile(upload.bytes, upload.fileName),
      })),
    );
    const changes = diff.changes.map(
      (change): ConduitChange & { commitHash: string } => {
        const metadata = { ...change.metadata };
        for (const { upload, phid } of uploaded) {
          if (upload.changePath === change.currentPath) {
            metadata[`${upload.side}:binary-phid`] = phid;
          }
        }
        return { ...change, metadata, commitHash: diff.commitHash };
      },
    );

    const repositoryPhid = await this.getRepositoryPhid();
    const created = await this.call(
      "differential.creatediff",
      {
        changes,
        sourceMachine: this.config.url,
        sourceControlSystem: "git",
        sourceControlPath: "/",
        sourceControlBaseRevision: diff.baseCommitHash,
        creationMethod: `phab-stack-${this.config.vcs}`,
        lintStatus: "none",
        unitStatus: "none",
        ...(repositoryPhid ? { repositoryPHID: repositoryPhid } : {}),
        sourcePath: this.config.sourcePath,
        branch: "HEAD",
      },
      CreateDiffSchema,
    );
    await this.call(
      "differential.setdiffproperty",
      {
        diff_id: created.diffid,
        name: CONTENT_HASH_PROPERTY,
        data: JSON.stringify(diff.contentHash),
      },
      v.unknown(),
    );
    return created.phid;
  }

  private async lookupUsers(names: string[]): Promise<Map<string, UserData>> {
    const users = new Map<string, UserData>();
    if (!names.length) return users;
    const { data } = await this.call(
      "user.search",
      {
        constraints: { usernames: names },
        attachments: { availability: true },
      },
      UserSearchSchema,
    );
    for (const user of data) {
      users.set(user.fields.username.toLowerCase(), user);
    }
    return users;
  }

  private async lookupGroups(slugs: string[]): Promise<Map<string, string>> {
    const groups = new Map<string, string>();
    if (!slugs.length) return groups;
    const result = await this.call(
      "project.search",
      { constraints: { slugs } },
      ProjectSearchSchema,
    );
    for (const project of result.data) {
      groups.set(project.fields.slug.toLowerCase(), project.phid);
    }
    const slugMap = result.maps?.slugMap;
    if (slugMap && !Array.isArray(slugMap)) {
      for (const [alias, entry] of Object.entries(slugMap)) {
        groups.set(alias.toLowerCase(), entry.projectPHID);
      }
    }
    return groups;
  }

  private lookup(
    names: ReviewerName[],
  ): Promise<[Map<string, UserData>, Map<string, string>]> {
    const unique = (group: boolean) => [
      ...new Set(names.filter((n) => n.group === group).map((n) => n.name)),
    ];
    return Promise.all([
      this.lookupUsers(unique(false)),
      this.lookupGroups(unique(true)),
    ]);
  }

  /**
   * Reviewers that can't review: unknown names, disabled and away users
   */
  async checkReviewers(reviewers: string[]): Promise<ReviewerProblem[]> {
    const names = parseReviewerNames(reviewers);
    const [users, groups] = await this.lookup(names);

    const problems: ReviewerProblem[] = [];
    const seen = new Set<string>();
    for (const reviewer of names) {
      const name = label(reviewer);
      const key = name.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);

      if (reviewer.group) {
        if (!groups.has(reviewer.name.toLowerCase())) {
          problems.push({ name, kind: "unknown" });
        }
        continue;
      }
      const user = users.get(reviewer.name.toLowerCase());
      const availability = user?.attachments?.availability;
      if (!user) {
        problems.push({ name, kind: "unknown" });
      } else if (user.fields.roles.includes("disabled")) {
        problems.push({ name, kind: "disabled" });
      } else if (availability?.value === "away") {
        const until = availability.until
          ? new Date(availability.until * 1000).toISOString().slice(0, 10)
          : null;
        problems.push({ name, kind: "away", until });
      }
    }
    return problems;
  }

  /**
   * Resolve reviewer nicks (and #project slugs) to PHIDs, wrapping blocking ones
   */
  async reviewerPhids(reviewers: string[]): Promise<string[]> {
    const names = parseReviewerNames(reviewers);
    const [users, groups] = await this.lookup(names);

    return names.map((reviewer) => {
      const key = reviewer.name.toLowerCase();
      const phid = reviewer.group ? groups.get(key) : users.get(key)?.phid;
      if (!phid) {
        throw new StackError(`${label(reviewer)} isn't a valid reviewer name`);
      }
      return reviewer.blocking ? `blocking(${phid})` : phid;
    });
  }

  private async edit(
    objectIdentifier: string | null,
    transactions: Transaction[],
  ): Promise<{ id: number; phid: string }> {
    const { object } = await this.call(
      "differential.revision.edit",
      {
        transactions,
        ...(objectIdentifier ? { objectIdentifier } : {}),
      },
      RevisionEditSchema,
    );
    this.phids.set(object.id, object.phid);
    return object;
  }

  private async parentTransaction(
    parent: RemoteIdentity | null,
  ): Promise<Transaction> {
    return {
      type: "parents.set",
      value: parent === null ? [] : [await this.phidFor(parent)],
    };
  }

  private async reviewersTransaction(
    reviewers: string[],
  ): Promise<Transaction> {
    return {
      type: "reviewers.set",
      value: await this.reviewerPhids(reviewers),
    };
  }

  async createRevision(
    content: RevisionContent,
    parent: RemoteIdentity | null,
  ): Promise<RemoteIdentity> {
    const diffPhid = await this.createDiff(content.diff);
    const transactions: Transaction[] = [
      { type: "title", value: content.title },
      { type: "summary", value: content.summary },
    ];
    if (content.bugId) {
      transactions.push({ type: "bugzilla.bug-id", value: content.bugId });
    }
    if (content.reviewers.length && !content.wip) {
      transactions.push(await this.reviewersTransaction(content.reviewers));
    }
    transactions.push({ type: "update", value: diffPhid });
    if (parent !== null) {
      transactions.push(await this.parentTransaction(parent));
    }
    if (content.wip) {
      transactions.push({ type: "plan-changes", value: true });
    }
    const object = await this.edit(null, transactions);
    return object.id;
  }

  async updateRevision(
    identity: RemoteIdentity,
    content: RevisionContent,
    parent: RemoteIdentity | null,
    options: UpdateOptions,
  ): Promise<void> {
    const existing = await this.revisionByIdentity(identity);
    const existingStatus = existing.fields.status.value;

    const transactions: Transaction[] = [
      { type: "title", value: content.title },
      { type: "summary", value: content.summary },
    ];
    if (content.bugId && content.bugId !== bugIdOf(existing)) {
      transactions.push({ type: "bugzilla.bug-id", value: content.bugId });
    }
    if (options.comment) {
      transactions.push({ type: "comment", value: options.comment });
    }
    if (content.reviewers.length && !content.wip && !hasReviewers(existing)) {
      transactions.push(await this.reviewersTransaction(content.reviewers));
    }
    if (options.includeDiff) {
      transactions.push({
        type: "update",
        value: await this.createDiff(content.diff),
      });
    }
    transactions.push(await this.parentTransaction(parent));

    // AIDEV-NOTE: A new diff puts the revision back into needs-review, so an
    // already changes-planned revision needs plan-changes in a second call
    const postTransactions: Transaction[] = [];
    if (content.wip) {
      if (existingStatus === "changes-planned") {
        if (options.includeDiff) {
          postTransactions.push({ type: "plan-changes", value: true });
        }
      } else {
        transactions.push({ type: "plan-changes", value: true });
      }
    } else if (
      existingStatus !== "needs-review" &&
      existingStatus !== "accepted"
    ) {
      transactions.push({ type: "request-review", value: true });
    }

    await this.edit(existing.phid, transactions);
    if (postTransactions.length) {
      await this.edit(existing.phid, postTransactions);
    }
  }

  async setParent(
    identity: RemoteIdentity,
    parent: RemoteIdentity | null,
  ): Promise<void> {
    await this.edit(await this.phidFor(identity), [
      await this.parentTransaction(parent),
    ]);
  }
}
