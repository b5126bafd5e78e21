// src/scripts/jobs/bridge-sampler.mts
import "dotenv/config";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { createBridgeSettings } from "@/core/bridge/settings";
import { describeDevice, listDevices, pickDefaultSerial } from "@/core/device/devices";
import { FrameRateEstimator, TraceProcessorShell, resolveTraceProcessor } from "@/core/fps";
import { createAdbExecutor } from "@/core/remote/adb";
import { describeError } from "@/lib/errors";
import { SamplerLoop } from "@/core/sampler/loop";
import { getEnv } from "@/lib/env";
import { DiagnosticLog } from "@/lib/log/diagnostics";

async function main() {
  const env = getEnv();
  const argv = await yargs(hideBin(process.argv))
    .scriptName("npm run sampler --")
    .option("serial", {
      alias: "s",
      type: "string",
      describe: "adb serial of the device to sample (default: DEVICE_SERIAL, else the first attached device)",
    })
    .option("adb", {
      type: "string",
      describe: "adb binary (default: ADB_PATH, else adb on PATH)",
    })
    .option("package", {
      alias: "p",
      type: "string",
      describe: "package id of the on-device monitor app (default: BRIDGE_PACKAGE)",
    })
    .option("trace-processor", {
      type: "string",
      describe: "trace_processor binary for offline frame-rate captures (default: TRACE_PROCESSOR, else PATH)",
    })
    .option("list-devices", {
      type: "boolean",
      default: false,
      describe: "Print attached devices and exit",
    })
    .strict()
    .help()
    .parseAsync();

  const adbPath = argv.adb ?? env.ADB_PATH ?? "adb";

  if (argv["list-devices"]) {
    const devices = await listDevices(adbPath);
    if (!devices.length) console.log("[devices] none attached");
    for (const d of devices) console.log(`[devices] ${d.state.padEnd(12)} ${describeDevice(d)}`);
    return;
  }

  const serial = argv.serial ?? env.DEVICE_SERIAL ?? pickDefaultSerial(await listDevices(adbPath));
  const settings = createBridgeSettings(argv.package ?? env.BRIDGE_PACKAGE);
  const exec = createAdbExecutor({ adbPath, serial });
  const log = new DiagnosticLog();

  const explicitTp = argv["trace-processor"] ?? env.TRACE_PROCESSOR;
  const resolveQuery = () => {
    const tp = resolveTraceProcessor({ explicit: explicitTp });
    return tp ? new TraceProcessorShell(tp) : null;
  };
  const query = resolveQuery();
  if (!query) log.line("WARN", "trace_processor not found; offline frame-rate captures wait until it appears on PATH");

  const estimator = new FrameRateEstimator({ exec, log, query, resolveQuery });
  const sampler = new SamplerLoop({ exec, settings, log, estimator, stopJoinMs: env.SAMPLER_STOP_JOIN_MS });

  const controller = new AbortController();
  const onSignal = (sig: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    log.line("INFO", `${sig} received, stopping`);
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  await sampler.run(controller.signal);
}

main().catch((err: unknown) => {
  console.error("[bridge-sampler] fatal:", describeError(err));
  process.exitCode = 1;
});
