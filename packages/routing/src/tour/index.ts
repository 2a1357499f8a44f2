/**
 * Tour module.
 *
 * Construction (nearest neighbor) followed by improvement (2-opt).
 */

export { constructTour } from "./nearest-neighbor.js";
export {
  improveTour,
  improveTourWithStats,
  type TwoOptOptions,
  type TwoOptResult,
} from "./two-opt.js";
