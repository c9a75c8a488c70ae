import type { SerialDataBits, SerialParity, SerialStopBits } from "../../models/config";

export interface SerialPortInfo {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  vendorId?: string;
  productId?: string;
}

export interface OpenPortParams {
  path: string;
  baudRate: number;
  dataBits?: SerialDataBits;
  stopBits?: SerialStopBits;
  parity?: SerialParity;
}

export interface PortLister {
  list(): Promise<SerialPortInfo[]>;
}
