/**
 * Pipeline modules export
 */

export { harvest, harvestAll } from "./harvester";
export { mix } from "./mixer";
export {
  createImageTarget,
  download,
  rotate,
  downloadAndRotate,
} from "./store-writer";
export { downloadAndRotateAll } from "./downloader";
export { stats } from "./stats";
