// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export { memoryTransport } from "./transport.js";
export type { MemoryTransport, MemoryTransportOptions } from "./transport.js";
