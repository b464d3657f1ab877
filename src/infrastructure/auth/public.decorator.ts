import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

/** Endpoint sin x-api-key (solo el healthcheck) */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
