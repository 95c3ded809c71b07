/**
 * @chaptify/media
 *
 * Input file inspection.
 *
 * Responsibilities:
 * - Probe containers with ffprobe (duration, tags, existing chapters)
 * - Derive the identity key used to look the recording up in the catalog
 */

// Probing
export { FFProbe, tagsToEmbedded, type FFProbeResult, type FFProbeOptions } from './probes/ffprobe.js';

// Identity
export { extractIdentity, parseFileName, type IdentityInput, type ParsedFileName } from './identity.js';
