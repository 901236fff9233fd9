import { APIGatewayProxyStructuredResultV2 } from "aws-lambda";

/**
 * CORS Headers
 *
 * The dashboard is served from its own CloudFront domain, so every response
 * allows cross-origin reads.
 */
const CORS_HEADERS = {
    'Access-Control-Allow-Origin': '*',
};

export type ErrorStatusCode = 400 | 404 | 422 | 500 | 502;
const ERROR_STATUS_CODE_MESSAGE_MAP: Record<ErrorStatusCode, string> = {
    400: 'Bad request',
    404: 'Not found',
    422: 'Unprocessable entity',
    500: 'Internal server error',
    502: 'Bad gateway',
};

/**
 * Create a standardized error response
 * Logs the error message and optional error object to console
 * @param statusCode HTTP status code for the error
 * @param message Detailed error message; can be string or Error object
 * @param error Optional error object for raw logging
 * @returns Standardized error response object
 */
export function createErrorResponse(
    statusCode: ErrorStatusCode,
    message: string | Error | unknown,
    error?: unknown
): APIGatewayProxyStructuredResultV2 {
    const _message = message instanceof Error ? message.message : String(message);
    if (error)
        console.error(`${_message}:`, error);
    else
        console.error(`${_message}`);
    return {
        statusCode,
        headers: {
            'Content-Type': 'application/json',
            ...CORS_HEADERS,
        },
        body: JSON.stringify({ error: ERROR_STATUS_CODE_MESSAGE_MAP[statusCode], message: _message }),
    };
}

/**
 * Create a standardized success response
 * If no data is provided, returns 204 No Content else 200 OK with data
 * @param data Optional data to include in the response body as JSON
 * @returns Standardized success response object
 */
export function createSuccessResponse(
    data?: unknown
): APIGatewayProxyStructuredResultV2 {
    const hasBody = data !== undefined;
    return {
        statusCode: hasBody ? 200 : 204,
        headers: {
            ...(hasBody ? { 'Content-Type': 'application/json' } : {}),
            ...CORS_HEADERS,
        },
        body: hasBody ? JSON.stringify(data) : undefined,
    };
}

/**
 * Create a CSV file download response
 * @param csv Serialized CSV document
 * @param fileName File name offered to the browser
 */
export function createCsvResponse(
    csv: string,
    fileName: string
): APIGatewayProxyStructuredResultV2 {
    return {
        statusCode: 200,
        headers: {
            'Content-Type': 'text/csv; charset=utf-8',
            'Content-Disposition': `attachment; filename="${fileName}"`,
            ...CORS_HEADERS,
        },
        body: csv,
    };
}

/**
 * Relay a response from an upstream service without touching its body
 * @param statusCode Upstream status code
 * @param body Raw upstream body text, returned as plain text
 */
export function createPassthroughResponse(
    statusCode: number,
    body: string
): APIGatewayProxyStructuredResultV2 {
    return {
        statusCode,
        headers: {
            'Content-Type': 'text/plain; charset=utf-8',
            ...CORS_HEADERS,
        },
        body,
    };
}
