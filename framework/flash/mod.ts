/**
 * Layer 4: Flash
 *
 * Short-lived messages carried across one request through the session.
 */

export { FlashStore, type SerializedFlash, type SerializeOptions } from './flash.ts';
