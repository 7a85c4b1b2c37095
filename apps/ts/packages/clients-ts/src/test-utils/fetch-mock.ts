export function createMockResponse<T>(data: T, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: { 'Content-Type': 'application/json' },
  });
}

export function createMockErrorResponse(message: string, status: number): Response {
  return new Response(JSON.stringify({ message }), {
    status,
    statusText: message,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function createGraphQLResponse<T>(data: T): Response {
  return createMockResponse({ data });
}

export function createGraphQLErrorResponse(...messages: string[]): Response {
  return createMockResponse({ data: null, errors: messages.map((message) => ({ message })) });
}

export function createNetworkError(): TypeError {
  return new TypeError('Failed to fetch');
}

/**
 * Read the JSON body a mocked fetch call was made with
 */
export function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

export function requestHeaders(init: RequestInit | undefined): Headers {
  return new Headers(init?.headers);
}
