// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Wire protocol constants shared by the session and the decoder.
 */

/** Field separator of the header line */
export const FIELD_SEPARATOR = "|";

/** Literal tag opening every buffer header */
export const HEADER_TAG = "data";

/** Batch-termination sentinel, sent after the command text */
export const FINALIZE = "finalize";

/** Shutdown sentinel, sent once when the session closes */
export const EXIT = "exit";
