/**
 * Shared TextEncoder/TextDecoder singletons for print buffers.
 * Centralizes encoding instances to avoid redundant per-module instantiation.
 */

export const textEncoder = new TextEncoder();
export const textDecoder = new TextDecoder();
