import { fetchDetectionExport } from '../services/apiService';
import type { DetectionExportFile } from '../types';
import { useRemoteData, type UseRemoteDataResult } from './useRemoteData';

/**
 * Custom hook for the detection records export
 *
 * `data` is null once loaded when the table holds no records.
 */
export function useDetectionExport(
  apiUrl: string,
  refreshKey = 0
): UseRemoteDataResult<DetectionExportFile | null> {
  return useRemoteData(fetchDetectionExport, apiUrl, refreshKey);
}
