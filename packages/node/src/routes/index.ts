/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createVaultRoutes, createRegistryRoutes } from "./vaults.js";
export { createCustodyRoutes } from "./custody.js";
export { createAssetRoutes } from "./assets.js";
export { createHostRoutes } from "./host.js";
