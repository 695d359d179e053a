import type { FilesListResponse, FilesRemoteListResponse } from "@slack/web-api";
import { SlackCaller } from "../core/caller";

export class FilesClient {
  private caller: SlackCaller;

  constructor(caller: SlackCaller) {
    this.caller = caller;
  }

  /**
   * List files created between two timestamps.
   */
  async listFiles(fromTs?: string, toTs?: string): Promise<FilesListResponse> {
    return this.caller.call("files.list", (api) => api.listFiles(fromTs, toTs));
  }

  /**
   * List remote files added between two timestamps.
   */
  async listRemoteFiles(
    fromTs?: string,
    toTs?: string
  ): Promise<FilesRemoteListResponse> {
    return this.caller.call("files.remote.list", (api) =>
      api.listRemoteFiles(fromTs, toTs)
    );
  }
}
