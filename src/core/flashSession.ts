import { NOOP_LOGGER, scopedLogger, type FlashLogger } from "../logging/flashLogger";
import type {
  DeviceIdentity,
  FlasherConfig,
  SerialLineConfig,
  SessionStage,
  TransferPlan,
  VerificationSpec
} from "../models/config";
import { RawReplController } from "../services/repl/rawReplController";
import { locateDevice } from "../services/serial/deviceLocator";
import type { PortLister } from "../services/serial/protocol";
import { withSerialLink, type SerialLink } from "../services/serial/serialLink";
import { planTransfer, transferFile, type TransferProgress } from "../services/transfer/chunkedTransfer";
import { verifyDevice } from "../services/verify/verificationDriver";
import { formatBytes, sleep } from "../utils/helpers";
import { errorMessage } from "./errors";

export type SessionEvent =
  | { type: "stage"; stage: SessionStage }
  | { type: "progress"; progress: TransferProgress }
  | { type: "message"; level: "info" | "warn"; text: string };

type SessionListener = (event: SessionEvent) => void;

export interface FlashSessionDeps {
  lister: PortLister;
  openLink(identity: DeviceIdentity, serial: SerialLineConfig): Promise<SerialLink>;
  logger?: FlashLogger;
  wait?: (ms: number) => Promise<void>;
}

export interface FlashRequest {
  payload: Buffer;
  verification: VerificationSpec;
  /** Explicit port when more than one matching device is attached. */
  portPath?: string;
}

export interface FlashResult {
  identity: DeviceIdentity;
  bytesWritten: number;
  writeStatements: number;
}

/**
 * locate → interrupt → raw → transfer → reboot → verify → reboot. Any stage
 * failure ends the session; the device is pushed back towards a normal boot
 * before the error is rethrown.
 */
export class FlashSession {
  private readonly listeners = new Set<SessionListener>();
  private readonly logger: FlashLogger;
  private readonly wait: (ms: number) => Promise<void>;
  private currentStage: SessionStage = "idle";

  public constructor(
    private readonly config: FlasherConfig,
    private readonly deps: FlashSessionDeps
  ) {
    this.logger = deps.logger ?? NOOP_LOGGER;
    this.wait = deps.wait ?? sleep;
  }

  public get stage(): SessionStage {
    return this.currentStage;
  }

  public onDidEmit(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  public async run(request: FlashRequest): Promise<FlashResult> {
    this.setStage("idle");
    try {
      const plan = planTransfer(request.payload, this.config.transfer);
      const identity = await locateDevice(this.deps.lister, {
        match: this.config.device,
        path: request.portPath
      });
      this.setStage("located");
      this.message("info", `Found device on ${identity.path}`);

      return await withSerialLink(
        () => this.deps.openLink(identity, this.config.serial),
        (link) => this.drive(link, identity, plan, request.verification),
        (closeError) => this.logger.log(`[session] closing ${identity.path} failed: ${errorMessage(closeError, "unknown close error")}`)
      );
    } catch (error) {
      this.logger.log(`[session] failed in stage ${this.currentStage}: ${errorMessage(error, String(error))}`);
      this.setStage("failed");
      throw error;
    }
  }

  private async drive(
    link: SerialLink,
    identity: DeviceIdentity,
    plan: TransferPlan,
    verification: VerificationSpec
  ): Promise<FlashResult> {
    const controller = new RawReplController(link, this.config.repl, scopedLogger(this.logger, "repl"));
    try {
      await controller.interrupt();
      this.setStage("interrupted");

      await controller.enterRawMode();
      this.setStage("raw");

      this.setStage("transferring");
      this.message("info", `Writing ${formatBytes(plan.payload.length)} to ${plan.destination}`);
      const transfer = await transferFile(
        controller,
        plan,
        (progress) => this.emit({ type: "progress", progress }),
        scopedLogger(this.logger, "transfer")
      );

      this.setStage("rebooting");
      await this.reboot(controller);
      this.message("info", `Waiting ${Math.round(this.config.bootWaitMs / 1000)}s for the payload to run`);
      await this.wait(this.config.bootWaitMs);
      controller.markRunning();

      this.setStage("verifying");
      await verifyDevice(controller, verification, scopedLogger(this.logger, "verify"));
      this.message("info", `Verified ${verification.entries.length + (verification.fileChecks?.length ?? 0)} value(s)`);

      this.setStage("finalizing");
      await this.wait(this.config.rebootSettleMs);
      await controller.softReboot();
      this.setStage("done");
      return { identity, bytesWritten: transfer.bytesWritten, writeStatements: transfer.writeStatements };
    } catch (error) {
      await this.recover(controller);
      throw error;
    }
  }

  private async reboot(controller: RawReplController): Promise<void> {
    if (controller.state === "raw" || controller.state === "executing") {
      await controller.exitRawMode();
      await this.wait(this.config.rebootSettleMs);
    }
    await controller.softReboot();
  }

  /** Best effort only: failures here are logged and never replace the original error. */
  private async recover(controller: RawReplController): Promise<void> {
    if (controller.state === "running" || controller.state === "rebooting") {
      return;
    }
    try {
      if (controller.state === "executing") {
        await controller.interrupt();
      }
      // the device may be in raw mode even when the banner was never seen
      await controller.exitRawMode();
      await this.wait(this.config.rebootSettleMs);
      await controller.softReboot();
      this.message("warn", "Device rebooted after failure");
    } catch (recoveryError) {
      const message = errorMessage(recoveryError, "unknown recovery error");
      this.logger.log(`[session] recovery failed: ${message}`);
      this.message("warn", `Could not reboot the device after failure: ${message}`);
    }
  }

  private setStage(stage: SessionStage): void {
    this.currentStage = stage;
    this.logger.log(`[session] stage ${stage}`);
    this.emit({ type: "stage", stage });
  }

  private message(level: "info" | "warn", text: string): void {
    this.emit({ type: "message", level, text });
  }

  private emit(event: SessionEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
