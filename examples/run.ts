#!/usr/bin/env node

// Dispatcher script for running the sampler examples
// Usage:
//   npm run example                 - Run basic example (default)
//   npm run example -- [type]       - Run a specific example
//
// Types:
//   basic        Draw 10 000 values and compare counts with probabilities
//   seeded       Show that a fixed seed reproduces the same draws
//   list         Show detailed descriptions

const arg = process.argv[2];

async function runExample(modulePath: string, message: string) {
  console.log(`${message}\n`);
  await import(modulePath);
}

function showList() {
  console.log("Available Examples:\n");
  console.log("  basic        - Weighted sampling of [-1, 0, 1, 2, 3]");
  console.log(
    "                 Prints expected and actual counts over 10 000 draws\n"
  );

  console.log("  seeded [s]   - Reproducible draws");
  console.log(
    "                 Draws twice with seed s (default 10) and compares the runs\n"
  );

  console.log("Usage:");
  console.log("  npm run example                 - Run basic example (default)");
  console.log("  npm run example -- [type]       - Run a specific example\n");
}

(async () => {
  switch (arg) {
    case "seeded":
      await runExample("./seeded-example", "Running seeded example...");
      break;

    case "basic":
      await runExample("./basic-usage", "Running basic usage example...");
      break;

    case "list":
      showList();
      break;

    case undefined:
      await runExample(
        "./basic-usage",
        "Running basic usage example (default)..."
      );
      break;

    default:
      console.error(`Unknown example type: ${arg}\n`);
      showList();
      process.exit(1);
  }
})().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
