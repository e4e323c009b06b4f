export { hashFile } from "./hasher.js";
export {
  createNodeFileLinker,
  destinationWithSubdirectory,
  type FileLinker,
  type MoveOptions,
} from "./linker.js";
