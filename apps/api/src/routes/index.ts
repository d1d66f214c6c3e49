export { serviceRoutes, type ServiceRoutesOptions } from "./services.js";
