export enum InputInhibited {
  NOT_INHIBITED = 0,
  SYSTEM_WAIT = 1,
  COMM_CHECK = 2,
  PROG_CHECK = 3,
  MACHINE_CHECK = 4,
  OTHER = 5,
}
