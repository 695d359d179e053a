import type { TeamInfoResponse } from "@slack/web-api";
import { SlackCaller } from "../core/caller";

export class TeamClient {
  private caller: SlackCaller;

  constructor(caller: SlackCaller) {
    this.caller = caller;
  }

  /**
   * Get info about the workspace the token belongs to.
   */
  async getTeamInfo(): Promise<TeamInfoResponse> {
    return this.caller.call("team.info", (api) => api.getTeamInfo());
  }
}
