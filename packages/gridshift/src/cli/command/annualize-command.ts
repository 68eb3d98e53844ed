import { parseArgs } from "node:util";
import process from "node:process";
import { engineFor, extractVerbosity, formatHour, parseHourFromCommand, parseNonNegativeNumberFromCommand, printSources, resolveSettings } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export async function annualizeCommand(argv = process.argv.slice(2)) {
  const { level: verbosity, rest } = extractVerbosity(argv);

  const { values } = parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      kwh: { type: "string" },
      hour: { type: "string" },
      cost: { type: "string" },
      region: { type: "string" },
      season: { type: "string" },
      renewable: { type: "string" },
      basis: { type: "string" },
      json: { type: "boolean" },
    },
  });

  if (values.help) {
    printHelp();
    return;
  }

  if (values.kwh === undefined) {
    throw new Error("--kwh is required");
  }
  const kwh = parseNonNegativeNumberFromCommand("--kwh", values.kwh, 0);
  const hour = parseHourFromCommand("--hour", values.hour);

  const settings = await resolveSettings(values);
  const engine = await engineFor(settings, verbosity);

  const details = engine.profileDetails(settings.region, settings.season, settings.renewableAdjust);
  const projection = engine.annualize(details.profile, kwh, hour, settings.costPerTonneUSD);

  if (values.json) {
    console.log(JSON.stringify({ regionCode: details.regionCode, season: details.season, ...projection }, null, 2));
    return;
  }

  if (verbosity >= 1) printSources(settings);

  console.log(`Region: ${details.regionCode}  Season: ${details.season}`);
  console.log(`Move ${kwh} kWh/day from ${formatHour(hour)} to ${formatHour(projection.bestHour)}`);
  console.log("\n---------SAVINGS----------\n");
  console.log(`Daily: ${projection.dailyKg.toFixed(3)} kg`);
  console.log(`Monthly: ${projection.monthlyKg.toFixed(2)} kg`);
  console.log(`Yearly: ${projection.yearlyKg.toFixed(1)} kg`);
  console.log(`Yearly offset value: $${projection.yearlyCostUSD.toFixed(2)} at $${settings.costPerTonneUSD}/t`);
  console.log(`Reduction: ${(projection.savingsPct * 100).toFixed(1)} %`);
}
