/**
 * Core module index - exports all core functionality
 */

// Constants
export * from "./constants/index";

// Config
export * from "./config/index";

// Types
export * from "./types/index";

// Entity model
export * from "./entity/index";
export * from "./validation/index";

// Extraction
export * from "./extraction/index";

// Fetching
export * from "./http/index";

// Persistence
export * from "./database/index";

// Crawl
export * from "./execution/index";

// Change detection
export * from "./changes/index";

// Services
export * from "./services/index";

// Utils
export * from "./utils/index";
