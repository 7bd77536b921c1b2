/**
 * Scraping Error Classification Tests
 */

import { classifyError, parseError, ScrapingErrorType } from '../errors';

describe('classifyError', () => {
  it('should classify HTTP statuses', () => {
    expect(classifyError(undefined, 429).type).toBe(ScrapingErrorType.RATE_LIMITED);
    expect(classifyError(undefined, 404).type).toBe(ScrapingErrorType.NOT_FOUND);
    expect(classifyError(undefined, 502).type).toBe(ScrapingErrorType.SERVER_ERROR);
    expect(classifyError(undefined, 403)).toEqual({
      type: ScrapingErrorType.HTTP_ERROR,
      message: 'Unexpected status 403',
      statusCode: 403,
    });
  });

  it('should classify aborted requests as timeouts', () => {
    const error = new Error('This operation was aborted');
    error.name = 'AbortError';

    expect(classifyError(error).type).toBe(ScrapingErrorType.TIMEOUT);
  });

  it('should classify connection faults as network errors', () => {
    expect(classifyError(new Error('fetch failed')).type).toBe(ScrapingErrorType.NETWORK_ERROR);
    expect(classifyError(new Error('connect ECONNREFUSED 127.0.0.1:443')).type).toBe(
      ScrapingErrorType.NETWORK_ERROR
    );
  });

  it('should keep the message of anything else', () => {
    expect(classifyError(new Error('boom'))).toEqual({
      type: ScrapingErrorType.UNKNOWN,
      message: 'boom',
    });
  });
});

describe('parseError', () => {
  it('should build a parse fault', () => {
    expect(parseError('Missing required field(s): title')).toEqual({
      type: ScrapingErrorType.PARSE_ERROR,
      message: 'Missing required field(s): title',
    });
  });
});
