export { UsersClient } from "./client";
