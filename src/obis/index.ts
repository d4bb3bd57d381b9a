/**
 * OBIS Module - Public API
 */

// Types
export type {
  ObisBillingCheck,
  ObisCategory,
  ObisCode,
  ObisInfo,
} from "./schema.js";

// Schemas
export { OBIS_CATEGORIES, ObisStringSchema } from "./schema.js";

// Pure transformations
export {
  formatObis,
  getObisInfo,
  isAccumulationRegister,
  isBillingRelevant,
  isTransactionRegister,
  normalizeObis,
  OBIS_REGISTRY,
  parseObis,
  validateObisForBilling,
} from "./transform.js";
