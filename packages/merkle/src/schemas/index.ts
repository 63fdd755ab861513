/**
 * Schema barrel export.
 */

export {
  OpeningV1,
  PathStepV1,
  PathSide,
} from "./opening.js";
