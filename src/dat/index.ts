export { BinaryReader } from './binaryReader.js';
export type { ByteOrder, IntWidth } from './binaryReader.js';
export { channelIds, decodeDat, relabelRun } from './decoder.js';
export { parseElementList, ELEMENT_LIST_SUFFIX } from './elementList.js';
export { describeWarning, hasFaraday } from './types.js';
export type {
  AcquisitionMode,
  ContainerRevision,
  DataQualityWarning,
  DatRevision,
  DecodeOptions,
  MassLayout,
  Run,
  RunHeader,
  ScanRecord,
} from './types.js';
