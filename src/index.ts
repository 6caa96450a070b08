import { env, logger } from "./config/index.js";
import { createFxCore, formatConversion, FxError, normalizeCurrencyCode, type FxCore } from "./fx/index.js";

const USAGE = [
  "usage:",
  "  fx-core currencies",
  "  fx-core rate <base> <target>",
  "  fx-core convert <base> <target> <amount>",
  "  fx-core trend <base> <target>",
].join("\n");

class UsageError extends Error {
  constructor() {
    super(USAGE);
  }
}

const fx = createFxCore();
const controller = new AbortController();

function print(value: unknown) {
  process.stdout.write(JSON.stringify(value, null, 2) + "\n");
}

function requireArgs(args: string[], count: number): string[] {
  if (args.length < count) throw new UsageError();
  return args.slice(0, count);
}

async function run(core: FxCore, command: string | undefined, args: string[]) {
  const options = { signal: controller.signal };

  switch (command) {
    case "currencies":
      print(await core.supportedCurrencies(options));
      break;

    case "rate": {
      const [base, target] = requireArgs(args, 2);
      const rate = await core.currentRate(base, target, options);
      print({
        base: normalizeCurrencyCode(base),
        target: normalizeCurrencyCode(target),
        rate: rate.toString(),
        date: new Date().toISOString().slice(0, 10),
      });
      break;
    }

    case "convert": {
      const [base, target, amount] = requireArgs(args, 3);
      print(formatConversion(await core.convert(base, target, amount, options)));
      break;
    }

    case "trend": {
      const [base, target] = requireArgs(args, 2);
      const report = await core.trendReport(base, target, options);
      print({ ...report, rates: report.rates.map((rate) => rate.toString()) });
      break;
    }

    default:
      throw new UsageError();
  }
}

async function main() {
  const [command, ...args] = process.argv.slice(2);
  logger.debug({ command, upstream: env.FX_API_BASE_URL }, "Running fx-core");

  try {
    await run(fx, command, args);
  } catch (error) {
    if (error instanceof UsageError) {
      process.stderr.write(error.message + "\n");
      process.exitCode = 2;
    } else if (error instanceof FxError) {
      process.stderr.write(JSON.stringify(error.toJSON()) + "\n");
      process.exitCode = 1;
    } else {
      throw error;
    }
  } finally {
    await fx.close();
  }
}

function shutdown(signal: string) {
  logger.info({ signal }, "Aborting in-flight request");
  controller.abort(new Error(`Received ${signal}`));
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

main().catch((err) => {
  logger.fatal({ err }, "fx-core failed");
  process.exit(1);
});
