import type { HttpResponse, RequestSpec } from '../types.js';

// Hook errors are not caught here: they reject the attempt or round that ran the hook.

export async function invokeBefore(request: RequestSpec): Promise<void> {
  if (request.beforeRequest) {
    await request.beforeRequest(request);
  }
}

export async function invokeAfter(request: RequestSpec, response: HttpResponse): Promise<void> {
  if (request.afterResponse) {
    await request.afterResponse(response);
  }
}
