/**
 * useRemoteData Custom Hook
 *
 * Loads one dashboard resource and tracks its loading and error state.
 * Each section of the dashboard owns its own instance, so a failure in one
 * section never blocks another from rendering.
 */

import { useState, useEffect, useCallback } from 'react';

/**
 * Hook state interface
 */
export interface UseRemoteDataResult<T> {
  /** Last successfully loaded value, undefined until the first load completes */
  data: T | undefined;
  /** Loading state indicator */
  loading: boolean;
  /** Error message if the load fails, null otherwise */
  error: string | null;
  /** Marks the data stale and loads it again */
  refresh: () => void;
}

/**
 * @param load - Fetch function; must be stable across renders (a module-level function)
 * @param apiUrl - The base URL of the API Gateway endpoint
 * @param refreshKey - Optional key that triggers a reload when changed
 */
export function useRemoteData<T>(
  load: (apiUrl: string) => Promise<T>,
  apiUrl: string,
  refreshKey = 0
): UseRemoteDataResult<T> {
  const [data, setData] = useState<T | undefined>(undefined);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);
  const [localRefreshKey, setLocalRefreshKey] = useState(0);

  const refresh = useCallback(() => {
    setLocalRefreshKey(prev => prev + 1);
  }, []);

  useEffect(() => {
    let cancelled = false;

    const loadData = async () => {
      setLoading(true);
      setError(null);

      try {
        const value = await load(apiUrl);

        // Ignore responses that arrive after unmount or a newer request
        if (!cancelled) {
          setData(value);
        }
      } catch (err) {
        if (!cancelled) {
          console.error('Error loading dashboard data:', err);
          setError(err instanceof Error ? err.message : 'Failed to load data');
        }
      } finally {
        if (!cancelled) {
          setLoading(false);
        }
      }
    };

    void loadData();

    return () => {
      cancelled = true;
    };
  }, [load, apiUrl, refreshKey, localRefreshKey]);

  return {
    data,
    loading,
    error,
    refresh,
  };
}
