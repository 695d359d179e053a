import type { ISlackApi } from "../../src/core/interfaces/ISlackApi";
import type { ILogger } from "../../src/core/interfaces/ILogger";
import { createClient } from "../../src/index";
import { SlackApiError, TransientTimeoutError } from "../../src/errors";

export function createFakeApi(overrides: Partial<ISlackApi> = {}): ISlackApi {
  const notStubbed = (name: string) => async (): Promise<never> => {
    throw new Error(`${name} not stubbed`);
  };

  return {
    listChannels: notStubbed("listChannels"),
    getChannelInfo: notStubbed("getChannelInfo"),
    listChannelMembers: notStubbed("listChannelMembers"),
    listChannelMessages: notStubbed("listChannelMessages"),
    listThreadReplies: notStubbed("listThreadReplies"),
    listUsers: notStubbed("listUsers"),
    listUserGroups: notStubbed("listUserGroups"),
    getTeamInfo: notStubbed("getTeamInfo"),
    listFiles: notStubbed("listFiles"),
    listRemoteFiles: notStubbed("listRemoteFiles"),
    joinChannel: notStubbed("joinChannel"),
    ...overrides,
  };
}

export interface RecordingLogger extends ILogger {
  warnings: string[];
  debugs: string[];
}

export function createRecordingLogger(): RecordingLogger {
  const warnings: string[] = [];
  const debugs: string[] = [];
  return {
    warnings,
    debugs,
    warn: (message) => {
      warnings.push(message);
    },
    debug: (message) => {
      debugs.push(message);
    },
  };
}

export function createRecordingSleep() {
  const sleeps: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    sleeps.push(ms);
  };
  return { sleeps, sleep };
}

export function createTestClient(api: ISlackApi) {
  const logger = createRecordingLogger();
  const { sleeps, sleep } = createRecordingSleep();
  const client = createClient({ api, logger, sleep });
  return { client, logger, sleeps };
}

export function rateLimited(retryAfter?: string): SlackApiError {
  const headers: Record<string, string> =
    retryAfter === undefined ? {} : { "Retry-After": retryAfter };
  return new SlackApiError("ratelimited", "ratelimited", headers);
}

export function apiError(code: string): SlackApiError {
  return new SlackApiError(code, `An API error occurred: ${code}`, {}, {
    ok: false,
    error: code,
  });
}

export function timeout(): TransientTimeoutError {
  return new TransientTimeoutError("socket timed out");
}
