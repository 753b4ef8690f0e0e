import { InvalidActivationCodeError } from './errors';

/**
 * Parsed eSIM activation code.
 * Wire format: LPA:1$<SMDP_ADDRESS>$<MATCHING_ID>[$<SMDP_OID>[$<CONFIRMATION_CODE_REQUIRED>]]
 */
export interface ActivationCode {
    raw: string;
    smdpAddress: string;
    matchingId: string;
    smdpOid?: string;
    confirmationCodeRequired: boolean;
}

/**
 * Request handed to the eUICC service for a direct download.
 */
export interface DownloadableSubscription {
    encodedActivationCode: string;
    smdpAddress: string;
    matchingId: string;
    confirmationCodeRequired: boolean;
}

const LPA_PREFIX = 'LPA:';
const FORMAT_VERSION = '1';

export function parseActivationCode(input: string): ActivationCode {
    const raw = input.trim();
    if (!raw.toUpperCase().startsWith(LPA_PREFIX)) {
        throw new InvalidActivationCodeError(`Activation code must start with ${LPA_PREFIX}`);
    }

    const parts = raw.slice(LPA_PREFIX.length).split('$');
    const [version, smdpAddress, matchingId, smdpOid, confirmationFlag] = parts;

    if (parts.length < 3 || parts.length > 5) {
        throw new InvalidActivationCodeError(`Expected 3 to 5 '$'-separated fields, found ${parts.length}`);
    }
    if (version !== FORMAT_VERSION) {
        throw new InvalidActivationCodeError(`Unsupported activation code format version: '${version}'`);
    }
    if (!smdpAddress) {
        throw new InvalidActivationCodeError('SM-DP+ address is empty');
    }
    if (/\s/.test(smdpAddress)) {
        throw new InvalidActivationCodeError(`SM-DP+ address contains whitespace: '${smdpAddress}'`);
    }
    if (confirmationFlag !== undefined && confirmationFlag !== '1') {
        throw new InvalidActivationCodeError(`Confirmation code flag must be '1' when present`);
    }

    return {
        raw,
        smdpAddress,
        matchingId: matchingId ?? '',
        ...(smdpOid ? { smdpOid } : {}),
        confirmationCodeRequired: confirmationFlag === '1',
    };
}

export function forActivationCode(input: string): DownloadableSubscription {
    const code = parseActivationCode(input);
    return {
        encodedActivationCode: code.raw,
        smdpAddress: code.smdpAddress,
        matchingId: code.matchingId,
        confirmationCodeRequired: code.confirmationCodeRequired,
    };
}
