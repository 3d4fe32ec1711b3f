import { USAGE, parseCommand, readRunnerConfig, type RunnerConfig } from "./config.js";
import { renderText } from "./render.js";
import { startServer } from "./server.js";
import { LifegridSession } from "./session.js";

function printGenerations(config: RunnerConfig, generations: number): void {
  const session = LifegridSession.fromConfig(config);
  const universe = session.getUniverse();

  for (let i = 0; i <= generations; i += 1) {
    if (i > 0) {
      session.step();
    }
    console.log(`generation ${session.getGeneration()} (population ${universe.population()})`);
    console.log(renderText(universe));
    console.log("");
  }
}

async function serve(config: RunnerConfig): Promise<void> {
  const session = LifegridSession.fromConfig(config);
  const server = await startServer(session, config.port);

  console.log(`Lifegrid runner listening at ${server.url}`);
  console.log(`Streaming ${config.width}x${config.height} frames at ws://localhost:${config.port}/stream`);
  console.log(`Send {"v":1,"type":"play"} to start ticking every ${config.tickIntervalMs}ms`);

  const shutdown = async () => {
    session.close();
    await server.close();
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

async function main(): Promise<void> {
  const options = parseCommand(process.argv);

  if (options.command === "help") {
    console.log(USAGE);
    return;
  }

  const config = readRunnerConfig();

  if (options.command === "step") {
    printGenerations(config, options.generations);
    return;
  }

  await serve(config);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
