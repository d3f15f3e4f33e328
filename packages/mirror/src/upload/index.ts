export { buildChangesetDocument, buildOsmChange } from "./osm-change.js";
export {
  withChangeset,
  type ChangesetOptions,
  type ChangesetScope,
} from "./changeset.js";
