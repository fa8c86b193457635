/**
 * @utilkit/collections — Record, sequence and table helpers
 */

export {
  dropFields,
  setField,
  setSubfield,
  dropEmptyFields,
  mergePreferNonEmpty,
  mergeRecords,
  recordFromNamesValues,
  mapToRecord,
  type Fields,
} from "./records.js";

export { duplicates, foldlUnrolled } from "./sequences.js";

export { listToTable, tableToRecord, type Table, type TableToRecordOptions } from "./table.js";

export { tcFormat, tcPrint, type TcFormatOptions } from "./tc-format.js";
