export {
  parseManifest,
  loadManifest,
  decodeManifest,
  resolveHealthTimings,
  BUILTIN_HEALTH_TIMINGS,
  type LoadOptions,
  type LoadResult,
} from "./loader.js";
export { checkDocument, declaredServices, cidrContains, type DeclaredService } from "./validate.js";
