import { SetMetadata } from '@nestjs/common';

export const RAW_RESPONSE_KEY = 'rawResponse';

/** Skips the `{ success, data }` envelope for a handler or controller. */
export const RawResponse = () => SetMetadata(RAW_RESPONSE_KEY, true);
