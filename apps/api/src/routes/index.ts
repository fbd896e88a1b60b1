export { switchRoutes } from "./switches.js";
export { interfaceRoutes } from "./interfaces.js";
export { tagRoutes } from "./tags.js";
