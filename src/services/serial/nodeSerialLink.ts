import { SerialPort } from "serialport";
import type { OpenPortParams, PortLister, SerialPortInfo } from "./protocol";
import { BufferedSerialLink, type SerialTap } from "./serialLink";

function friendlyOpenError(portPath: string, error: Error): Error {
  const msg = error.message;
  if (msg.includes("File not found") || msg.includes("No such file")) {
    return new Error(`Port ${portPath} not found. Check that the device is connected and the port name is correct.`);
  }
  if (msg.includes("Access denied") || msg.includes("Permission denied")) {
    return new Error(`Permission denied on ${portPath}. Another application may have the port open, or you lack access rights.`);
  }
  if (msg.includes("resource busy") || msg.includes("already in use")) {
    return new Error(`Port ${portPath} is busy. Another application may already be using it.`);
  }
  return error;
}

function openPort(port: SerialPort): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    port.open((error) => (error ? reject(error) : resolve()));
  });
}

export class NodeSerialLink extends BufferedSerialLink {
  private constructor(
    path: string,
    private readonly port: SerialPort,
    tap?: SerialTap
  ) {
    super(path, tap);
    port.on("data", (data: Buffer) => {
      this.push(data);
    });
    port.on("error", (error: Error) => {
      this.fail(error);
    });
  }

  public static async open(params: OpenPortParams, tap?: SerialTap): Promise<NodeSerialLink> {
    const create = (): SerialPort =>
      new SerialPort({
        path: params.path,
        baudRate: params.baudRate,
        dataBits: params.dataBits,
        stopBits: params.stopBits,
        parity: params.parity,
        autoOpen: false
      });

    let port = create();
    try {
      await openPort(port);
    } catch (firstError) {
      // CH340 bridges sometimes reject the first configuration. DTR/RTS low
      // keeps the auto-reset circuit idle.
      port = create();
      try {
        await openPort(port);
      } catch (error) {
        const cause = error instanceof Error ? error : firstError;
        throw cause instanceof Error ? friendlyOpenError(params.path, cause) : new Error(`Unable to open ${params.path}`);
      }
      await new Promise<void>((resolve, reject) => {
        port.set({ dtr: false, rts: false }, (error) => (error ? reject(error) : resolve()));
      });
    }
    return new NodeSerialLink(params.path, port, tap);
  }

  protected send(data: Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.port.write(data, (error) => {
        if (error) {
          reject(error);
          return;
        }
        this.port.drain((drainError) => (drainError ? reject(drainError) : resolve()));
      });
    });
  }

  protected shutdown(): Promise<void> {
    if (!this.port.isOpen) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.port.close((error) => (error ? reject(error) : resolve()));
    });
  }
}

export const systemPortLister: PortLister = {
  async list(): Promise<SerialPortInfo[]> {
    return SerialPort.list();
  }
};
