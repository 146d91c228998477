/**
 * Strategy engine turns a quote series and a target price into a logged
 * trade decision.
 */
export * from './firstCandlesStrategy';
export * from './strategyEngine';
