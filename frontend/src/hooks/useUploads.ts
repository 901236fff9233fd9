import { fetchUploads } from '../services/apiService';
import type { UploadListing } from '../types';
import { useRemoteData, type UseRemoteDataResult } from './useRemoteData';

/**
 * Custom hook for the uploads listing
 *
 * Call `refresh()` after a mutating action (delete) to mark the listing stale
 * and fetch it again from the store.
 *
 * Usage:
 * ```tsx
 * const { data, loading, error, refresh } = useUploads(apiUrl);
 * ```
 */
export function useUploads(apiUrl: string, refreshKey = 0): UseRemoteDataResult<UploadListing> {
  return useRemoteData(fetchUploads, apiUrl, refreshKey);
}
