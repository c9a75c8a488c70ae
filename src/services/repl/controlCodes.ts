export const CTRL_A_ENTER_RAW = 0x01;
export const CTRL_B_EXIT_RAW = 0x02;
export const CTRL_C_INTERRUPT = 0x03;
export const CTRL_D_EXECUTE = 0x04;

export const RAW_BANNER = Buffer.from("raw REPL; CTRL-B to exit\r\n", "latin1");
export const RAW_PROMPT = Buffer.from(">", "latin1");
export const EXEC_ACK = Buffer.from("OK", "latin1");
export const END_OF_OUTPUT = Buffer.from([CTRL_D_EXECUTE]);
export const END_OF_EXCEPTION = Buffer.from([CTRL_D_EXECUTE]);
export const SOFT_REBOOT_NOTICE = Buffer.from("soft reboot\r\n", "latin1");

export const ENTER_RAW_SEQUENCE = Buffer.from([0x0d, CTRL_A_ENTER_RAW]);
export const EXIT_RAW_SEQUENCE = Buffer.from([0x0d, CTRL_B_EXIT_RAW]);
