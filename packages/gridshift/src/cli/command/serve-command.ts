import { parseArgs } from "node:util";
import process from "node:process";
import { buildServer } from "../../server/server.js";
import { engineFor, extractVerbosity, parsePositiveNumberFromCommand, resolveSettings } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export async function serveCommand(argv = process.argv.slice(2)) {
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
      cost: { type: "string" },
      port: { type: "string" },
      host: { type: "string" },
    },
  });

  if (values.help) {
    printHelp();
    return;
  }

  const settings = await resolveSettings(values);
  const engine = await engineFor(settings, verbosity);

  const port = parsePositiveNumberFromCommand("--port", values.port, settings.config.server.port);
  const host = values.host ?? settings.config.server.host;

  const app = buildServer(engine, { defaults: settings });
  await app.listen({ port, host });
}
