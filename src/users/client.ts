import type { UsergroupsListResponse, UsersListResponse } from "@slack/web-api";
import { SlackCaller } from "../core/caller";

export class UsersClient {
  private caller: SlackCaller;

  constructor(caller: SlackCaller) {
    this.caller = caller;
  }

  async listUsers(limit: number): Promise<UsersListResponse> {
    return this.caller.call("users.list", (api) => api.listUsers(limit));
  }

  async listUserGroups(
    includeCount: boolean,
    includeDisabled: boolean,
    includeUsers: boolean
  ): Promise<UsergroupsListResponse> {
    return this.caller.call("usergroups.list", (api) =>
      api.listUserGroups(includeCount, includeDisabled, includeUsers)
    );
  }
}
