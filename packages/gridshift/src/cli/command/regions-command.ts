import { parseArgs } from "node:util";
import process from "node:process";
import { listRegions } from "@gridshift/carbon-core";
import { engineFor, extractVerbosity, resolveSettings } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export async function regionsCommand(argv = process.argv.slice(2)) {
  const { level: verbosity, rest } = extractVerbosity(argv);

  const { values } = parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      json: { type: "boolean" },
    },
  });

  if (values.help) {
    printHelp();
    return;
  }

  const settings = await resolveSettings(values);
  const engine = await engineFor(settings, verbosity);
  const regions = listRegions(engine.data);

  if (values.json) {
    console.log(JSON.stringify(regions, null, 2));
    return;
  }

  console.log(`${"Code".padEnd(8)} ${"Base".padStart(6)} ${"Implied".padStart(8)}  Source`);
  for (const region of regions) {
    console.log(
      `${region.code.padEnd(8)} ${region.baseFactor.toFixed(3).padStart(6)} ${region.impliedIntensity.toFixed(3).padStart(8)}  ${region.meta.source}`
    );
  }
}
