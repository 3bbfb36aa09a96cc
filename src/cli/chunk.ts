import { errorMessage } from "../pipeline/errors";
import { error } from "../pipeline/log";
import { planChunksForFile } from "../pipeline/run";
import { applyLogArgs, baseCli, overridesFromArgs } from "./options";

async function main() {
  const argv = await baseCli().parse();

  applyLogArgs(argv);
  const plan = await planChunksForFile(argv.input, {
    profile: argv.profile,
    profilesFile: argv["profiles-file"],
    overrides: overridesFromArgs(argv),
  });
  console.log(JSON.stringify(plan, null, 2));
}

main().catch((e) => {
  error("cli.fatal", { error: errorMessage(e) });
  console.error(String(e));
  process.exit(1);
});
