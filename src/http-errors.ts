import { Boom, badImplementation, badRequest, isBoom, serverUnavailable } from '@hapi/boom';
import { MeasurementError, errorMessage } from './errors.js';

// body-parser and other middleware flag request faults with `status` / `statusCode`
function clientStatusOf(err: object): number | undefined {
    const status: unknown = Reflect.get(err, 'status') ?? Reflect.get(err, 'statusCode');
    return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/** Map a failure to the HTTP response the API returns for it. */
export function toBoom(err: unknown): Boom {
    if (isBoom(err)) return err;

    if (err instanceof MeasurementError) {
        switch (err.code) {
            case 'CONFIGURATION':
                return badRequest(err.message, { code: err.code });
            case 'CATALOG_UNAVAILABLE':
            case 'FALLBACK_UNRESOLVED':
            case 'PROBE_ENVIRONMENT':
                return serverUnavailable(err.message, { code: err.code });
            case 'TRANSIENT_MEASUREMENT':
                break;
        }
    }

    if (err && typeof err === 'object') {
        const statusCode = clientStatusOf(err);
        if (statusCode !== undefined) {
            if (Reflect.get(err, 'type') === 'entity.parse.failed') {
                return badRequest('Malformed JSON body');
            }
            return new Boom(errorMessage(err), { statusCode });
        }
    }

    return badImplementation(errorMessage(err));
}

export function boomPayload(boom: Boom): { statusCode: number; error: string; message: string; code?: string } {
    const { statusCode, error, message } = boom.output.payload;
    const data: unknown = boom.data;
    const code = data && typeof data === 'object' && 'code' in data && typeof data.code === 'string'
        ? data.code
        : undefined;
    return code ? { statusCode, error, message, code } : { statusCode, error, message };
}
