export { fetchByBbox } from "./api.js";
export * from "./overpass/index.js";
