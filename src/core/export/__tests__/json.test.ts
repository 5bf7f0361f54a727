import { describe, it, expect } from '@jest/globals';
import { formatJsonOutput, toReport } from '../json.js';
import type { BatchResult } from '../../types/index.js';

const result: BatchResult = {
  success: true,
  message: 'Processed 1 works from 2 inputs (1 failed)',
  downloadedCount: 1,
  failedCount: 1,
  details: [
    { input: 'https://a.test/1', status: 'success', extractedIds: ['111'], payloadSize: 1 },
    { input: 'https://a.test/2', status: 'failed', extractedIds: [], error: 'bad link', payloadSize: 0 },
  ],
};

describe('toReport', () => {
  it('should flatten outcomes into url records', () => {
    expect(toReport(result)).toEqual({
      success: true,
      message: 'Processed 1 works from 2 inputs (1 failed)',
      downloadedCount: 1,
      failedCount: 1,
      details: [
        { url: 'https://a.test/1', status: 'success', extractedIds: ['111'] },
        { url: 'https://a.test/2', status: 'failed', error: 'bad link' },
      ],
    });
  });

  it('should omit empty id lists and absent errors', () => {
    const [, failedDetail] = toReport(result).details;

    expect(Object.keys(failedDetail)).toEqual(['url', 'status', 'error']);
  });
});

describe('formatJsonOutput', () => {
  it('should pretty-print the report', () => {
    const output = formatJsonOutput({ ...result, details: [] });

    expect(output).toBe(
      '{\n  "success": true,\n  "message": "Processed 1 works from 2 inputs (1 failed)",\n  "downloadedCount": 1,\n  "failedCount": 1,\n  "details": []\n}'
    );
  });
});
