export { type CostCell, TileGrid } from "./tile-grid";
export {
  DEFAULT_CHARSET,
  type GridCharset,
  type ParsedGrid,
  parseGrid,
  renderGrid,
} from "./text-format";
export { BLOCKED, type SearchGrid, type Tile } from "./types";
