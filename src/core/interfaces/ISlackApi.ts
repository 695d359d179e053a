import type {
  ConversationsHistoryResponse,
  ConversationsInfoResponse,
  ConversationsJoinResponse,
  ConversationsListResponse,
  ConversationsRepliesResponse,
  FilesListResponse,
  FilesRemoteListResponse,
  TeamInfoResponse,
  UsergroupsListResponse,
  UsersListResponse,
} from "@slack/web-api";

export type Channel = NonNullable<ConversationsInfoResponse["channel"]>;

/**
 * Slack Web API surface consumed by the caller.
 * Implementations throw SlackApiError or TransientTimeoutError for failures
 * they recognize and pass anything else through.
 */
export interface ISlackApi {
  listChannels(
    types: string,
    excludeArchived: boolean
  ): Promise<ConversationsListResponse>;

  getChannelInfo(
    channel: string,
    includeMemberCount: boolean
  ): Promise<Channel | undefined>;

  listChannelMembers(channel: string): Promise<string[]>;

  listChannelMessages(
    channel: string,
    oldestTs?: string,
    latestTs?: string
  ): Promise<ConversationsHistoryResponse>;

  listThreadReplies(
    channel: string,
    ts: string,
    inclusive: boolean,
    oldestTs?: string,
    latestTs?: string
  ): Promise<ConversationsRepliesResponse>;

  listUsers(limit: number): Promise<UsersListResponse>;

  listUserGroups(
    includeCount: boolean,
    includeDisabled: boolean,
    includeUsers: boolean
  ): Promise<UsergroupsListResponse>;

  getTeamInfo(): Promise<TeamInfoResponse>;

  listFiles(fromTs?: string, toTs?: string): Promise<FilesListResponse>;

  listRemoteFiles(
    fromTs?: string,
    toTs?: string
  ): Promise<FilesRemoteListResponse>;

  joinChannel(channel: string): Promise<ConversationsJoinResponse>;
}
