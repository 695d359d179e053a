export {
  ConversationsClient,
  FETCH_MEMBERS_FAILED,
  NOT_IN_CHANNEL,
} from "./client";
