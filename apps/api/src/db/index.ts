export { initializeDatabase, getDatabase, closeDatabase } from "./schema.js";
export * as servicesRepo from "./repositories/services.js";
export * as configDocumentsRepo from "./repositories/config-documents.js";
