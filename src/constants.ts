export const DAT_INSPECT = 'dat_inspect' as const;
export const DAT_CONVERT = 'dat_convert' as const;

export type DatToolName =
  | typeof DAT_INSPECT
  | typeof DAT_CONVERT;

export const SERVER_NAME = 'icp-dat';
export const SERVER_VERSION = '0.3.0';
