import { USAGE, parseArgs } from "@/cli/args";
import { runRender } from "@/cli/run";
import { BUILTIN_SCENES } from "@/scenes/builtinScenes";

/**
 * Main entry point for the command-line renderer
 */

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));

  switch (command.kind) {
    case "help":
      console.log(USAGE);
      return;
    case "list":
      for (const scene of BUILTIN_SCENES) {
        console.log(`${scene.id.padEnd(16)}${scene.description}`);
      }
      return;
    case "error":
      console.error(command.message);
      console.error("Run with --help for usage.");
      process.exitCode = 1;
      return;
    case "render": {
      const summary = await runRender(command.options);
      console.log(
        `Wrote ${summary.output} (${summary.width}x${summary.height} ${summary.format}, ${summary.bytes} bytes) in ${summary.durationMs}ms`
      );
    }
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
