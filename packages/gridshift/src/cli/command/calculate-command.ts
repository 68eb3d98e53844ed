import { parseArgs } from "node:util";
import process from "node:process";
import { efficiencyScore } from "@gridshift/carbon-core";
import { engineFor, extractVerbosity, parseEntryPairs, printSources, resolveSettings } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export async function calculateCommand(argv = process.argv.slice(2)) {
  const { level: verbosity, rest } = extractVerbosity(argv);

  const { values } = parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      entry: { type: "string", multiple: true },
      region: { type: "string" },
      renewable: { type: "string" },
      basis: { type: "string" },
      strict: { type: "boolean" },
      json: { type: "boolean" },
    },
  });

  if (values.help) {
    printHelp();
    return;
  }

  const entry = parseEntryPairs(values.entry ?? []);
  if (Object.keys(entry).length === 0) {
    throw new Error("Missing activities: use --entry <activity>=<quantity> (repeatable)");
  }

  const settings = await resolveSettings(values);
  const engine = await engineFor(settings, verbosity);

  const electricity = engine.resolveOrDefault(settings.region, settings.renewableAdjust);
  const result = engine.calculate(entry, electricity.effectiveFactor, { strict: !!values.strict });

  if (values.json) {
    console.log(JSON.stringify({ ...result, electricity }, null, 2));
    return;
  }

  if (verbosity >= 1) printSources(settings);

  console.log(`Region: ${electricity.regionCode}${electricity.fallbackUsed ? ` (requested ${electricity.requestedRegion})` : ""}`);
  console.log(`Electricity factor: ${electricity.effectiveFactor.toFixed(4)} kg CO2e/kWh (${electricity.basis}, renewable ${(electricity.renewableAdjust * 100).toFixed(0)} %)`);
  console.log("\n--------ACTIVITIES--------\n");
  for (const [id, kg] of Object.entries(result.perActivity)) {
    console.log(`${id.padEnd(22)} ${kg.toFixed(3)} kg`);
  }
  console.log("\n--------CATEGORIES--------\n");
  for (const [category, kg] of Object.entries(result.perCategory)) {
    console.log(`${category.padEnd(22)} ${kg.toFixed(3)} kg`);
  }
  console.log("\n--------------------------\n");
  console.log(`Total: ${result.total.toFixed(3)} kg CO2e`);

  if (result.ignored.length) {
    console.log(`Ignored (unknown activities): ${result.ignored.join(", ")}`);
  }

  if (verbosity >= 1) {
    const score = efficiencyScore(engine.data, entry);
    console.log(`Efficiency: ${score.score}/100 (${score.badge})`);
    for (const note of score.notes) console.log(`  ${note}`);
  }
}
