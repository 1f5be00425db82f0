/**
 * Verification Module
 */

export * from './apply-and-verify.js';
