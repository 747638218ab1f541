// SPDX-License-Identifier: MIT
/** Package version, sent in the User-Agent header. */
export const VERSION = '0.1.0';

export const USER_AGENT = `vm-cli/${VERSION}`;
