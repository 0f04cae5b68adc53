import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

/**
 * Marks a route (or controller) as reachable without credentials.
 * A valid JWT presented on a public route is still attached to the request.
 */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
