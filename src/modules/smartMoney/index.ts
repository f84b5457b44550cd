/**
 * Smart Money Concepts (SMC) Module Index
 */

export * from './types.js';
export * from './swingPoints.js';
export * from './orderBlocks.js';
export * from './fairValueGaps.js';
export * from './premiumDiscount.js';
export * from './marketStructure.js';
export * from './liquiditySweep.js';
export * from './analyzer.js';
