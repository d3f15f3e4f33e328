export {
  isElementType,
  parseApiNode,
  parseApiWay,
  parseApiRelation,
  parseApiElements,
  isInside,
  referencesOf,
  SORT_RANK,
  sortKey,
  compareForCreate,
  compareForDelete,
  toDeletePayload,
  toCreatePayload,
  type ChangeRecord,
} from "./element.js";
export { ElementCollection } from "./collection.js";
