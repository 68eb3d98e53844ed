import { parseArgs } from "node:util";
import process from "node:process";
import { engineFor, extractVerbosity, formatHour, parsePositiveNumberFromCommand, printSources, resolveSettings } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export async function profileCommand(argv = process.argv.slice(2)) {
  const { level: verbosity, rest } = extractVerbosity(argv);

  const { values } = parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      region: { type: "string" },
      season: { type: "string" },
      renewable: { type: "string" },
      basis: { type: "string" },
      top: { type: "string" },
      json: { type: "boolean" },
    },
  });

  if (values.help) {
    printHelp();
    return;
  }

  const settings = await resolveSettings(values);
  const top = parsePositiveNumberFromCommand("--top", values.top, 3);
  const engine = await engineFor(settings, verbosity);

  const details = engine.profileDetails(settings.region, settings.season, settings.renewableAdjust);
  const lowHours = engine.topNLowHours(details.profile, top);

  if (values.json) {
    console.log(JSON.stringify({ ...details, lowHours }, null, 2));
    return;
  }

  if (verbosity >= 1) printSources(settings);

  console.log(`Region: ${details.regionCode}  Season: ${details.season}`);
  console.log(`Template: ${details.template} (${details.rule})`);
  console.log(`Average intensity: ${details.scale.toFixed(4)} kg CO2e/kWh`);
  console.log("\n----------HOURLY----------\n");
  details.profile.forEach((intensity, hour) => {
    console.log(`${formatHour(hour)}  ${intensity.toFixed(4)}`);
  });
  console.log("\n--------------------------\n");
  console.log(`Cleanest hours: ${lowHours.map(formatHour).join(", ")}`);
}
