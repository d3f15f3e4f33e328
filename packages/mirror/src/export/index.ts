export { renderOsmChange, writeOsmChangeFile } from "./osc.js";
