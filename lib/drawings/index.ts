/**
 * Drawings Module - Public API
 *
 * Horizontal line mirroring across surfaces and JSON export.
 */

export { MIRROR_TAG, mirrorName, isMirrorName } from "./mirror";
export { LineSynchronizer } from "./synchronizer";
export { LineExporter } from "./exporter";
export type { ExportedLine, LineExport, LineExporterOptions } from "./exporter";
export { createLineExportTask } from "./export-task";
export type { LineExportTask } from "./export-task";
export { toHexTriplet, hexToRgb, rgbToHex, DEFAULT_LINE_COLOR } from "./colors";
