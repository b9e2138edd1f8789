/**
 * Exposure Kernel Types
 * Shared type definitions for kernel exports
 */

/**
 * JSON-safe value types
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/**
 * Broad classification of SDK failures
 */
export type ErrorCategory =
  | 'network' // Transport/connectivity failures
  | 'server' // Server-reported failures (XML error envelope, Exposure response message)
  | 'parse' // Response body matches no known shape
  | 'decode' // JSON value rejected by a model decoder
  | 'content_identifier' // Key request URL carries no usable asset id
  | 'configuration' // Missing URLs or settings on the entitlement/environment
  | 'platform_drm'; // Passed through from the platform DRM primitive

/**
 * Error code definition
 */
export interface ErrorDefinition {
  code: string;
  title: string;
  description: string;
  retriable: boolean;
  category: ErrorCategory;
}
