import { main } from "./cli";

main(process.argv.slice(2)).then(
  code => {
    if (code !== 0) process.exit(code);
  },
  (err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
);
