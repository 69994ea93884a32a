/**
 * GitHubClient — the few REST calls the release step needs.
 *
 * Calls are sequential with no retry: a failed request fails the step.
 */

import { request, type Dispatcher } from "undici";
import { z } from "zod";
import { ReleaseApiError } from "../shared/errors.js";
import type { Approval, ReleasePayload } from "./announcement.js";

export interface GitHubClientConfig {
  token: string;
  /** `owner/repo` */
  repository: string;
  apiUrl?: string;
  /** Custom undici dispatcher (tests use a MockAgent). */
  dispatcher?: Dispatcher;
}

const ReleaseSchema = z.object({ id: z.number() }).passthrough();
export type Release = z.infer<typeof ReleaseSchema>;

const ApprovalEntrySchema = z.object({
  user: z.object({ login: z.string().min(1) }),
  state: z.string().nullish(),
});

/**
 * Keep approvals that name a user. The endpoint may answer with a bare array
 * or with `{ approvals: [...] }`.
 */
export function normalizeApprovals(raw: unknown): Approval[] {
  let items: unknown = raw;
  if (raw !== null && typeof raw === "object" && !Array.isArray(raw) && "approvals" in raw) {
    items = raw.approvals ?? [];
  }
  if (!Array.isArray(items)) return [];

  const approvals: Approval[] = [];
  for (const item of items) {
    const parsed = ApprovalEntrySchema.safeParse(item);
    if (!parsed.success) continue;
    approvals.push({
      user: parsed.data.user.login,
      state: (parsed.data.state || "approved").toLowerCase(),
    });
  }
  return approvals;
}

export class GitHubClient {
  private readonly apiUrl: string;
  private readonly headers: Record<string, string>;
  private readonly repository: string;
  private readonly dispatcher?: Dispatcher;

  constructor(config: GitHubClientConfig) {
    this.apiUrl = (config.apiUrl ?? "https://api.github.com").replace(/\/$/, "");
    this.repository = config.repository;
    this.dispatcher = config.dispatcher;
    this.headers = {
      Authorization: `Bearer ${config.token}`,
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
      "User-Agent": "deploy-artifact-helpers",
    };
  }

  /**
   * Issue a request and return the parsed JSON body (`{}` when empty).
   * With `allowNotFound`, a 404 yields null instead of an error.
   */
  async request(
    method: Dispatcher.HttpMethod,
    endpoint: string,
    options: { body?: unknown; allowNotFound?: boolean } = {},
  ): Promise<unknown> {
    const headers = { ...this.headers };
    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers["Content-Type"] = "application/json";
    }

    const response = await request(`${this.apiUrl}${endpoint}`, {
      method,
      headers,
      body,
      dispatcher: this.dispatcher,
    });
    const text = await response.body.text();

    if (response.statusCode === 404 && options.allowNotFound) return null;
    if (response.statusCode >= 400) {
      throw new ReleaseApiError(method, endpoint, response.statusCode, text);
    }
    return text ? (JSON.parse(text) as unknown) : {};
  }

  async getReleaseByTag(tagName: string): Promise<Release | null> {
    const found = await this.request(
      "GET",
      `/repos/${this.repository}/releases/tags/${encodeURIComponent(tagName)}`,
      { allowNotFound: true },
    );
    if (found === null) return null;
    return ReleaseSchema.parse(found);
  }

  async createRelease(payload: ReleasePayload): Promise<Release> {
    const created = await this.request("POST", `/repos/${this.repository}/releases`, {
      body: {
        tag_name: payload.tagName,
        name: payload.name,
        body: payload.body,
        draft: payload.draft,
        prerelease: payload.prerelease,
        target_commitish: payload.targetCommitish,
      },
    });
    return ReleaseSchema.parse(created);
  }

  async updateRelease(releaseId: number, payload: ReleasePayload): Promise<Release> {
    const updated = await this.request("PATCH", `/repos/${this.repository}/releases/${releaseId}`, {
      body: {
        name: payload.name,
        body: payload.body,
        draft: payload.draft,
        prerelease: payload.prerelease,
        target_commitish: payload.targetCommitish,
      },
    });
    return ReleaseSchema.parse(updated);
  }

  /** Approvals recorded for a workflow run; none when the run id is empty or unknown. */
  async listRunApprovals(runId: string): Promise<Approval[]> {
    if (!runId) return [];
    const raw = await this.request(
      "GET",
      `/repos/${this.repository}/actions/runs/${encodeURIComponent(runId)}/approvals`,
      { allowNotFound: true },
    );
    return normalizeApprovals(raw);
  }

  /** Update the release carrying `payload.tagName`, or create it. */
  async ensureRelease(payload: ReleasePayload): Promise<{ release: Release; created: boolean }> {
    const existing = await this.getReleaseByTag(payload.tagName);
    if (existing) {
      return { release: await this.updateRelease(existing.id, payload), created: false };
    }
    return { release: await this.createRelease(payload), created: true };
  }
}
