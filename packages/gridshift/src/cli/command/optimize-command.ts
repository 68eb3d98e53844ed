import { parseArgs } from "node:util";
import process from "node:process";
import { engineFor, extractVerbosity, formatHour, parseTaskSpec, printSources, resolveSettings } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export async function optimizeCommand(argv = process.argv.slice(2)) {
  const { level: verbosity, rest } = extractVerbosity(argv);

  const { values } = parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      task: { type: "string", multiple: true },
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

  const tasks = (values.task ?? []).map(parseTaskSpec);
  if (tasks.length === 0) {
    throw new Error('Missing tasks: use --task "<name>:<kwh>:<hour>" (repeatable)');
  }

  const settings = await resolveSettings(values);
  const engine = await engineFor(settings, verbosity);

  const details = engine.profileDetails(settings.region, settings.season, settings.renewableAdjust);
  const comparison = engine.compare(details.profile, tasks);

  if (values.json) {
    console.log(JSON.stringify({ regionCode: details.regionCode, season: details.season, ...comparison }, null, 2));
    return;
  }

  if (verbosity >= 1) printSources(settings);

  console.log(`Region: ${details.regionCode}  Season: ${details.season}`);
  console.log("\n----------TASKS-----------\n");
  for (const row of comparison.rows) {
    console.log(
      `${row.name}: ${row.kwh} kWh at ${formatHour(row.hour)} -> ${formatHour(row.optimalHour)}, `
      + `${row.estimatedCO2.toFixed(3)} -> ${row.optimalCO2.toFixed(3)} kg (saves ${row.savingsKg.toFixed(3)} kg, ${(row.savingsPct * 100).toFixed(1)} %)`
    );
  }
  console.log("\n--------------------------\n");
  console.log(`Total savings: ${comparison.totalSavingsKg.toFixed(3)} kg CO2e/day`);
  if (comparison.bestOpportunity) {
    console.log(`Best opportunity: ${comparison.bestOpportunity.name}`);
  }
}
