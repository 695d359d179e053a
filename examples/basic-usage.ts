/**
 * Basic Usage Example
 *
 * Reads settings from the environment (or a .env file) and walks the
 * operations a tap performs on each sync.
 */

import "dotenv/config";
import { createClient, loadConfigFromEnv } from "../src/index";

async function main() {
  const client = createClient({ ...loadConfigFromEnv(), debug: true });

  const team = await client.team.getTeamInfo();
  console.log(`✓ Team: ${team.team?.name ?? "unknown"}`);

  const page = await client.conversations.listChannels(
    "public_channel,private_channel",
    false
  );
  const channels = page.channels ?? [];
  console.log(`✓ Found ${channels.length} channels`);

  const latest = String(Math.floor(Date.now() / 1000));
  const oldest = String(Math.floor(Date.now() / 1000) - 24 * 60 * 60);

  for (const channel of channels.slice(0, 3)) {
    if (!channel.id) continue;

    const members = await client.conversations.listChannelMembers(channel.id);
    const history = await client.conversations.listChannelMessages(
      channel.id,
      oldest,
      latest
    );
    console.log(
      `✓ #${channel.name}: ${members.length} members, ${history?.messages?.length ?? 0} messages in the last day`
    );
  }

  const users = await client.users.listUsers(200);
  console.log(`✓ Found ${users.members?.length ?? 0} users`);

  const files = await client.files.listFiles(oldest, latest);
  console.log(`✓ Found ${files.files?.length ?? 0} files`);
}

main().catch(console.error);
