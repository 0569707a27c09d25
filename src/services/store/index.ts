export { CanonicalStore } from "./canonical-store.js";
