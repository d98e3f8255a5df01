export {
  hexToAxial, axialToPixel, hexToPixel, effectiveHexSize,
  hexCorners, hexagonVertices, hexagonPath,
} from './hex.js';
export type { AxialCoord, PixelCoord } from './hex.js';
export {
  ColorPalette, ColorMapper, normalize, bucketIndex,
  WHITE, DARK_GRAY, LIGHT_GRAY,
} from './color.js';
export type { StateColors } from './color.js';
export {
  toColumnData, buildRegionUniverse, partitionBySide, coordKey,
  RegionColumnUniverse, EntityColumnMap,
} from './columns.js';
export type { HexBounds } from './columns.js';
export {
  classifyColumn, processRegion, mirrorFor, summarizeStates,
  metricLabel, columnValue, layerValue,
} from './processor.js';
export type { RegionRequest } from './processor.js';
export { gridBounds, computeLayout } from './layout.js';
export type { BoundingBox, LegendBox, SceneLayout, LayoutOptions } from './layout.js';
export { renderSvg, escapeXml, jsonString, jsonStringArray } from './renderer.js';
export type { RenderOptions } from './renderer.js';
export { computeRegionMinMax, computeLayerMinMax, computeThresholds, buildScales } from './stats.js';
export type { ScalePolicy, ThresholdMethod, ScaleOptions } from './stats.js';
export {
  buildEyemapScenes, generateEyemaps, generateEyemapImages,
  renderScene, gridKey, parseGridKey,
} from './eyemap.js';
export type { EyemapRequest, EyemapScene, EyemapGrids } from './eyemap.js';
export { rasterize, isPng, toDataUri } from './raster.js';
export { exportEyemaps, eyemapFilename } from './exporter.js';
export type { ExportOptions } from './exporter.js';
export { ColumnStore } from './db.js';
export type { StoreStats } from './db.js';
export { checkHexSize, checkSpacingFactor, checkConfig } from './preflight.js';
export {
  defaultConfig, parseSideTag, parseSideSelection, selectionTag,
  RawColumnRecordSchema, DatasetRecordSchema, LayerMetricSchema, ColorThresholdsSchema,
  colorThresholdsSchema, PALETTE_SIZE,
} from './types.js';
export type * from './types.js';
