/**
 * @sandbox-mirror/types
 *
 * Shared domain types for copying OSM data into the development sandbox.
 *
 * - Geo: bounding boxes
 * - OSM: nodes, ways, relations and their composite keys
 */

export * from "./osm.js";
export * from "./geo.js";
