/**
 * mpris-relay
 * Publishes a media player's state on the session bus as an MPRIS2 player
 */

export * from "./config";
export * from "./events";
export { SimulatedPlayerHost, type SimulatedPlayerOptions } from "./hosts/SimulatedPlayerHost";
export type * from "./interfaces";
export * from "./mpris";
export * from "./services";
export type * from "./types";
export * from "./utils";
