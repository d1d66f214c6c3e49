export * from "./types/service-request.js";
export * from "./types/address-pool.js";
