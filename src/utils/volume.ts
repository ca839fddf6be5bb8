/**
 * Perceptual volume mapping.
 *
 * MPRIS clients show and send a volume on a cube-root scale of the audio
 * engine's linear amplitude: `protocol = host^(1/3)`, `host = protocol^3`.
 */

export function toProtocolVolume(hostVolume: number): number {
	return Math.cbrt(Math.max(0, hostVolume));
}

export function toHostVolume(protocolVolume: number): number {
	return Math.pow(protocolVolume, 3);
}

export function clampUnit(value: number): number {
	return Math.min(1, Math.max(0, value));
}
