import { ErrorCode, WebClient } from "@slack/web-api";
import type {
  ConversationsHistoryResponse,
  ConversationsJoinResponse,
  ConversationsListResponse,
  ConversationsRepliesResponse,
  FilesListResponse,
  FilesRemoteListResponse,
  TeamInfoResponse,
  UsergroupsListResponse,
  UsersListResponse,
} from "@slack/web-api";
import type { Channel, ISlackApi } from "../interfaces/ISlackApi";
import { RATE_LIMITED, SlackApiError, TransientTimeoutError } from "../../errors";

const TIMEOUT_CODES = ["ECONNABORTED", "ETIMEDOUT"];

export interface WebClientTransportOptions {
  timeout?: number;
}

/**
 * ISlackApi backed by @slack/web-api.
 * The WebClient's own retries are switched off so rate limits reach the caller.
 */
export class WebClientTransport implements ISlackApi {
  private readonly web: WebClient;

  constructor(web: WebClient) {
    this.web = web;
  }

  static fromToken(
    token: string,
    options: WebClientTransportOptions = {}
  ): WebClientTransport {
    return new WebClientTransport(
      new WebClient(token, {
        timeout: options.timeout,
        retryConfig: { retries: 0 },
        rejectRateLimitedCalls: true,
      })
    );
  }

  listChannels(
    types: string,
    excludeArchived: boolean
  ): Promise<ConversationsListResponse> {
    return invoke(() =>
      this.web.conversations.list({ types, exclude_archived: excludeArchived })
    );
  }

  async getChannelInfo(
    channel: string,
    includeMemberCount: boolean
  ): Promise<Channel | undefined> {
    const page = await invoke(() =>
      this.web.conversations.info({
        channel,
        include_num_members: includeMemberCount,
      })
    );
    return page.channel;
  }

  async listChannelMembers(channel: string): Promise<string[]> {
    const page = await invoke(() => this.web.conversations.members({ channel }));
    return page.members ?? [];
  }

  listChannelMessages(
    channel: string,
    oldestTs?: string,
    latestTs?: string
  ): Promise<ConversationsHistoryResponse> {
    return invoke(() =>
      this.web.conversations.history({
        channel,
        oldest: oldestTs,
        latest: latestTs,
      })
    );
  }

  listThreadReplies(
    channel: string,
    ts: string,
    inclusive: boolean,
    oldestTs?: string,
    latestTs?: string
  ): Promise<ConversationsRepliesResponse> {
    return invoke(() =>
      this.web.conversations.replies({
        channel,
        ts,
        inclusive,
        oldest: oldestTs,
        latest: latestTs,
      })
    );
  }

  listUsers(limit: number): Promise<UsersListResponse> {
    return invoke(() => this.web.users.list({ limit }));
  }

  listUserGroups(
    includeCount: boolean,
    includeDisabled: boolean,
    includeUsers: boolean
  ): Promise<UsergroupsListResponse> {
    return invoke(() =>
      this.web.usergroups.list({
        include_count: includeCount,
        include_disabled: includeDisabled,
        include_users: includeUsers,
      })
    );
  }

  getTeamInfo(): Promise<TeamInfoResponse> {
    return invoke(() => this.web.team.info());
  }

  listFiles(fromTs?: string, toTs?: string): Promise<FilesListResponse> {
    return invoke(() => this.web.files.list({ ts_from: fromTs, ts_to: toTs }));
  }

  listRemoteFiles(
    fromTs?: string,
    toTs?: string
  ): Promise<FilesRemoteListResponse> {
    return invoke(() =>
      this.web.files.remote.list({ ts_from: fromTs, ts_to: toTs })
    );
  }

  joinChannel(channel: string): Promise<ConversationsJoinResponse> {
    return invoke(() => this.web.conversations.join({ channel }));
  }
}

async function invoke<T>(call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw normalizeWebApiError(error);
  }
}

/**
 * Map @slack/web-api errors onto SlackApiError / TransientTimeoutError.
 * Unrecognized errors are returned untouched.
 */
export function normalizeWebApiError(error: unknown): unknown {
  if (!(error instanceof Error) || !("code" in error)) {
    return error;
  }

  switch (error.code) {
    case ErrorCode.RateLimitedError: {
      const retryAfter = "retryAfter" in error ? error.retryAfter : undefined;
      const headers: Record<string, string> =
        typeof retryAfter === "number" ? { "retry-after": String(retryAfter) } : {};
      return new SlackApiError(RATE_LIMITED, error.message, headers, {}, error);
    }

    case ErrorCode.PlatformError: {
      const data = "data" in error && isRecord(error.data) ? error.data : {};
      const code = typeof data.error === "string" ? data.error : "unknown_error";
      return new SlackApiError(code, error.message, {}, data, error);
    }

    case ErrorCode.HTTPError: {
      const status = "statusCode" in error ? error.statusCode : undefined;
      const headers =
        "headers" in error ? flattenHeaders(error.headers) : {};
      const code = status === 429 ? RATE_LIMITED : `http_${String(status)}`;
      return new SlackApiError(code, error.message, headers, {}, error);
    }

    case ErrorCode.RequestError: {
      const original = "original" in error ? error.original : undefined;
      if (isTimeout(original)) {
        return new TransientTimeoutError(error.message, error);
      }
      return error;
    }

    default:
      return error;
  }
}

function isTimeout(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === "TimeoutError") {
    return true;
  }
  return (
    "code" in error &&
    typeof error.code === "string" &&
    TIMEOUT_CODES.includes(error.code)
  );
}

function flattenHeaders(headers: unknown): Record<string, string> {
  const flat: Record<string, string> = {};
  if (!isRecord(headers)) {
    return flat;
  }
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === "string" || typeof value === "number") {
      flat[key] = String(value);
    } else if (Array.isArray(value) && value.length > 0) {
      flat[key] = String(value[0]);
    }
  }
  return flat;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
