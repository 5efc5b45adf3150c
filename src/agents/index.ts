/**
 * agents/index.ts — Barrel export for the stateful layer that drives the portal.
 */

export { PortalNavigator, toRetiredBonds } from './portalNavigator';
export type { BondSource, NavigatorOptions } from './portalNavigator';
