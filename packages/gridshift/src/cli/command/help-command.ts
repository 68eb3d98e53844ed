export function printHelp() {
    console.log(`
Usage:
  gridshift regions [--json]
  gridshift calculate --entry <activity>=<qty> [--entry ...] [--region <code>] [--renewable <0..0.8>] [--basis base|implied] [--strict] [--json]
  gridshift profile [--region <code>] [--season <season>] [--renewable <0..0.8>] [--top <n>] [--json]
  gridshift optimize --task "<name>:<kwh>:<hour>" [--task ...] [--region <code>] [--season <season>] [--json]
  gridshift annualize --kwh <kWh/day> --hour <0..23> [--cost <USD/t>] [--region <code>] [--season <season>] [--json]
  gridshift serve [--port 3000] [--host 127.0.0.1]

Options:
  --config <file>        Settings file (default: ./gridshift.config.json when present)

  --region <code>        Grid region, e.g. FR, DE, US-CA (default: EU-avg)
  --season <season>      Spring, Summer, Autumn (or Fall), Winter (default: Summer)
  --renewable <r>        Share of consumption covered by own renewables, capped at 0.8 (default: 0)
  --basis <basis>        base = region table factor, implied = derived from the grid mix

  --entry <a>=<q>        Daily activity quantity, e.g. electricity_kwh=10 or bus_km=12
  --strict               Reject unknown activities instead of ignoring them
  --task <n>:<kWh>:<h>   Flexible load, e.g. "Dishwasher:1.5:19"
  --top <n>              Number of cleanest hours to list (default: 3)
  --cost <USD/t>         Offset price per tonne CO2e (default: 15)

  --json                 Print JSON output (machine-readable)
  -v / --verbose         Show where each setting came from
  -vv / --debug          Also report region fallbacks
`);
}
