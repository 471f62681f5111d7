import { STREAM_ID_PATTERN } from "@streamrelay/shared";
import { EncodingError } from "./errors.js";

/**
 * topic = namespace + "/" + stream id. The stream id must be a single
 * [A-Za-z0-9_.-] segment; anything else is rejected rather than rewritten.
 */
export function topicFor(namespace: string, streamId: string): string {
    if (!STREAM_ID_PATTERN.test(streamId)) {
        throw new EncodingError(
            `Invalid stream id "${streamId}" (expected one or more of [A-Za-z0-9_.-])`
        );
    }
    return `${namespace}/${streamId}`;
}
