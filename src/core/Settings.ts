// Page-level settings: URL query first, then localStorage
import type { SimulationOverrides } from '../physics/SimulationParameters.js';

const KEY_DEBUG = 'settings.debug';

export function isDebugEnabled(search: string = window.location.search): boolean {
  const query = new URLSearchParams(search).get('debug');
  if (query !== null) return query === '1';
  try {
    return localStorage.getItem(KEY_DEBUG) === '1';
  } catch {
    return false;
  }
}

// `?speed=500&softening=0.1&trail=2000`; unparsable values fall back to the defaults
export function readOverrides(search: string = window.location.search): SimulationOverrides {
  const params = new URLSearchParams(search);
  const num = (key: string): number | undefined => {
    const raw = params.get(key);
    if (raw === null || raw.trim() === '') return undefined;
    const value = Number(raw);
    return Number.isNaN(value) ? undefined : value;
  };

  const speed = num('speed');
  const softening = num('softening');
  const trail = num('trail');
  return {
    ...(speed !== undefined && { speedFactor: speed }),
    ...(softening !== undefined && { softening }),
    ...(trail !== undefined && { trail: { maxPoints: trail } }),
  };
}
