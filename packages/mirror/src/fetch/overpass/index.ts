/**
 * Overpass API (donor) download.
 */

export {
  buildFilterQuery,
  fetchByFilter,
  fetchOverpassStatus,
  type FilterQueryOptions,
  type DonorFetchOptions,
} from "./query.js";
export {
  parseOverpassNode,
  parseOverpassWay,
  parseOverpassRelation,
  parseOverpassElements,
} from "./parser.js";
