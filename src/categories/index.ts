export {
  KNOWN_CATEGORIES,
  GENERIC_CATEGORY_PROFILE,
  isKnownCategory,
  getCategoryProfile,
  normalizeCategoryName,
} from "./registry.js";
export type { CategoryProfile, KnownCategory } from "./registry.js";
