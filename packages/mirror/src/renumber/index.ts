export { IdMap, applyIdMap, assignPlaceholders, type IdMapEntry } from "./id-map.js";
