/**
 * Willingness module exports
 */

export { WillingnessRegistry, type WillingnessSink } from './registry.js';
