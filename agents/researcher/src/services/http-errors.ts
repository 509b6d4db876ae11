import axios from 'axios';
import { ApiError, NetworkError, toError } from '@content-research/shared';

/** Maps an axios failure onto the shared error taxonomy. */
export function toHttpError(error: unknown, context: string): Error {
    if (axios.isAxiosError(error)) {
        if (error.response) {
            return new ApiError(
                `${context} failed with HTTP ${error.response.status}`,
                error.response.status,
                error.response.statusText
            );
        }
        return new NetworkError(`${context} failed: ${error.code ?? error.message}`);
    }
    return toError(error);
}
