import { loadConfig, isAuthenticated, type AppConfig } from "./config";
import { ConfigError, errorMessage } from "./errors";
import { DiscordPresence } from "./discord";
import { PlexClient } from "./plex";
import { PresenceManager } from "./presence";
import { PresenceEngine } from "./engine";
import { log, setDebug } from "./log";

// CLI arguments
const TEST_MODE = process.argv.includes("--test");
const SERVERS_MODE = process.argv.includes("--servers");

function formatTime(ms: number): string {
  const total = Math.floor(ms / 1000);
  const mins = Math.floor(total / 60);
  const secs = total % 60;
  return `${mins}:${secs.toString().padStart(2, "0")}`;
}

function printPlexSetupHelp(): void {
  console.error("\n⚠️  Plex is not configured!");
  console.error("   1. Find your token: https://support.plex.tv/articles/204059436");
  console.error("   2. Set PLEX_TOKEN and PLEX_USERNAME in your environment or .env file");
  console.error("   3. Run `npm run servers` to list your servers");
  console.error("   4. Set PLEX_SERVER_ADDRESS, PLEX_SERVER_PORT and PLEX_SERVER_OWNED\n");
}

function createPlexClient(config: AppConfig): PlexClient | null {
  if (!config.plexToken || !config.plexUsername) return null;
  return new PlexClient({
    token: config.plexToken,
    username: config.plexUsername,
    clientIdentifier: config.clientIdentifier,
  });
}

async function listServers(config: AppConfig): Promise<void> {
  const plex = createPlexClient(config);
  if (!plex) {
    printPlexSetupHelp();
    process.exit(1);
  }

  console.log("📡 Fetching your Plex servers...\n");
  const servers = await plex.listServers();
  if (servers.length === 0) {
    console.log("No servers found for this account.");
    return;
  }
  for (const server of servers) {
    const ownership = server.owned ? "owned" : "shared";
    console.log(`🖥️  ${server.name} (${server.address}:${server.port}) [${ownership}]`);
  }
}

async function testMode(config: AppConfig): Promise<void> {
  console.log("🎬 Plex Discord Rich Presence - TEST MODE");
  console.log("=========================================");
  console.log("Testing Plex session detection (no Discord connection)\n");

  const plex = createPlexClient(config);
  const target = config.target;
  if (!plex || !target) {
    printPlexSetupHelp();
    process.exit(1);
  }

  const runTest = async () => {
    console.log(`📡 Fetching sessions from ${target.address}:${target.port}...\n`);
    try {
      const session = await plex.fetchSession(target);
      if (!session) {
        console.log("⏹️  Nothing playing for this user");
      } else {
        console.log("Raw session:", JSON.stringify(session, null, 2));
        console.log("");
        console.log(`🎵 Title: ${session.title}`);
        if (session.grandparentTitle) console.log(`📺 Series/Artist: ${session.grandparentTitle}`);
        if (session.parentTitle) console.log(`💿 Season/Album: ${session.parentTitle}`);
        console.log(`▶️  State: ${session.playerState.toUpperCase()} (${session.mediaKind})`);
        console.log(`⏳ Elapsed: ${formatTime(session.elapsed)} / ${formatTime(session.duration)}`);
      }
    } catch (error) {
      log.error(`Fetch failed: ${errorMessage(error)}`);
    }
    console.log("\n" + "=".repeat(50) + "\n");
  };

  await runTest();
  console.log(`Polling every ${config.pollInterval / 1000} seconds... Press Ctrl+C to stop.\n`);
  setInterval(() => void runTest(), config.pollInterval);
}

async function main() {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`\n⚠️  ${error.message}\n`);
      process.exit(1);
    }
    throw error;
  }
  setDebug(config.debug);

  if (SERVERS_MODE) {
    await listServers(config);
    return;
  }

  if (TEST_MODE) {
    await testMode(config);
    return;
  }

  console.log("🎬 Plex Discord Rich Presence");
  console.log("=".repeat(29));

  if (!config.discordClientId) {
    console.error("\n⚠️  Please set your Discord Client ID!");
    console.error("   1. Go to https://discord.com/developers/applications");
    console.error("   2. Create a new application");
    console.error('   3. Add images named "pause-circle", "sand-clock" and "sleep-mode" in Rich Presence > Art Assets');
    console.error("   4. Copy the Application ID");
    console.error("   5. Set DISCORD_CLIENT_ID in your environment or .env file\n");
    console.error("Example: DISCORD_CLIENT_ID=123456789 npm start");
    console.error("\nTip: Use --test flag to test Plex session detection without Discord:");
    console.error("     npm run test:plex");
    process.exit(1);
  }

  const plex = createPlexClient(config);
  if (!plex) {
    printPlexSetupHelp();
    process.exit(1);
  }
  const authenticated = isAuthenticated(config);

  const discord = new DiscordPresence(config.discordClientId);
  const presence = new PresenceManager(discord);
  const engine = new PresenceEngine({ source: plex, presence });

  const target = config.target;
  if (target) {
    const label = target.name ? `${target.name} (${target.address}:${target.port})` : `${target.address}:${target.port}`;
    const mode = target.owned ? "polling" : "push notifications";
    console.log(`🔍 Monitoring ${label} via ${mode}...\n`);
  }

  let ticking = false;
  let lastStatus: string | null = null;

  // Ticks never overlap: a beat is skipped while the previous one is still running
  async function updatePresence() {
    if (ticking) return;
    ticking = true;
    try {
      const status = await engine.tick(target, authenticated);
      if (status !== lastStatus) {
        console.log(`📊 ${status}`);
        lastStatus = status;
      }
    } catch (error) {
      log.warn(errorMessage(error));
    } finally {
      ticking = false;
    }
  }

  // Initial update
  await updatePresence();

  // Poll for changes
  const interval = setInterval(() => void updatePresence(), config.pollInterval);

  // Handle graceful shutdown
  const shutdown = async () => {
    console.log("\n\n👋 Shutting down...");
    clearInterval(interval);
    await engine.reset();
    await presence.disconnect();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  console.log("Press Ctrl+C to stop.\n");
}

main().catch((error) => {
  log.error(errorMessage(error));
  process.exit(1);
});
