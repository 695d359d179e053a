import type {
  ConversationsHistoryResponse,
  ConversationsJoinResponse,
  ConversationsListResponse,
  ConversationsRepliesResponse,
} from "@slack/web-api";
import { SlackCaller } from "../core/caller";
import type { Channel } from "../core/interfaces/ISlackApi";

export const FETCH_MEMBERS_FAILED = "fetch_members_failed";
export const NOT_IN_CHANNEL = "not_in_channel";

export class ConversationsClient {
  private caller: SlackCaller;

  constructor(caller: SlackCaller) {
    this.caller = caller;
  }

  /**
   * List channels of the given comma-separated types.
   */
  async listChannels(
    types: string,
    excludeArchived: boolean
  ): Promise<ConversationsListResponse> {
    return this.caller.call("conversations.list", (api) =>
      api.listChannels(types, excludeArchived)
    );
  }

  async getChannelInfo(
    channel: string,
    includeMemberCount: boolean
  ): Promise<Channel | undefined> {
    return this.caller.call("conversations.info", (api) =>
      api.getChannelInfo(channel, includeMemberCount)
    );
  }

  /**
   * Get member user ids of a channel.
   * Resolves to an empty list when Slack cannot fetch the members.
   */
  async listChannelMembers(channel: string): Promise<string[]> {
    return this.caller.call(
      "conversations.members",
      (api) => api.listChannelMembers(channel),
      {
        code: FETCH_MEMBERS_FAILED,
        fallback: [],
        warning: `Failed to fetch members for channel: ${channel}`,
      }
    );
  }

  /**
   * Get channel history between two timestamps.
   * Resolves to undefined for channels the bot is not a member of, which
   * happens for channels archived before the bot was added.
   */
  async listChannelMessages(
    channel: string,
    oldestTs?: string,
    latestTs?: string
  ): Promise<ConversationsHistoryResponse | undefined> {
    return this.caller.call<ConversationsHistoryResponse | undefined>(
      "conversations.history",
      (api) => api.listChannelMessages(channel, oldestTs, latestTs),
      {
        code: NOT_IN_CHANNEL,
        fallback: undefined,
        warning: `Skipping messages for channel: ${channel}, the bot is not a member`,
      }
    );
  }

  async listThreadReplies(
    channel: string,
    ts: string,
    inclusive: boolean,
    oldestTs?: string,
    latestTs?: string
  ): Promise<ConversationsRepliesResponse> {
    return this.caller.call("conversations.replies", (api) =>
      api.listThreadReplies(channel, ts, inclusive, oldestTs, latestTs)
    );
  }

  async joinChannel(channel: string): Promise<ConversationsJoinResponse> {
    return this.caller.call("conversations.join", (api) =>
      api.joinChannel(channel)
    );
  }
}
