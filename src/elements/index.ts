/**
 * Elements Module
 *
 * Element factories, schema validation and the dataset container.
 */

export {
  createRaster,
  createImage,
  createLabels,
  createMultiscaleRaster,
  buildPyramid,
  createPointTable,
  createPolygonSet,
  createCircles,
  type ElementOptions,
  type RasterOptions,
  type MultiscaleOptions,
  type PointOptions,
  type ShapeOptions,
} from './factories.js';

export {
  validateElement,
  getModel,
  getAxesNames,
  isMultiscale,
  isPointTable,
} from './models.js';

export {
  SpatialDataset,
  groupOf,
  type DatasetElements,
  type DatasetEntry,
  type ElementGroup,
  type RasterElement,
} from './dataset.js';

export { createNDArray, getValue, sizeOf, dtypeOf, DTYPES } from './ndarray.js';
