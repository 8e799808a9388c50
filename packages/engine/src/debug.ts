/**
 * Engine debug logging helpers.
 */

const ENGINE_DEBUG_FLAG = String(process.env.BROADSIDE_DEBUG || '').toLowerCase();

const engineDebugEnabled =
  ENGINE_DEBUG_FLAG === '1' || ENGINE_DEBUG_FLAG === 'true' || ENGINE_DEBUG_FLAG === 'yes';

export function engineDebug(...args: unknown[]) {
  if (!engineDebugEnabled) return;
  // eslint-disable-next-line no-console
  console.log('[engine]', ...args);
}
