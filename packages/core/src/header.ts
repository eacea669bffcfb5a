// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { FIELD_SEPARATOR, HEADER_TAG } from "./constants.js";
import { formatShape, type Container } from "./container.js";
import { describe, type TypeDescriptor } from "./dtype.js";
import { InvalidNameError, UnsupportedElementTypeError } from "./errors.js";

/**
 * Assemble `data|<name>|<tag>|<count>|<shape>`.
 *
 * No validation: `name` must not contain `|`. Use `encodeHeader()` for
 * anything user-supplied.
 */
export function buildHeader(
  name: string,
  descriptor: TypeDescriptor,
  elementCount: number,
  shape: string,
): string {
  return [HEADER_TAG, name, descriptor.tag, String(elementCount), shape].join(
    FIELD_SEPARATOR,
  );
}

/**
 * Throws if `name` cannot be carried in a header field.
 */
export function validateName(name: string): void {
  if (name.length === 0) {
    throw new InvalidNameError("Buffer name must not be empty", name);
  }
  if (name.includes(FIELD_SEPARATOR)) {
    throw new InvalidNameError(
      `Buffer name "${name}" contains the field separator "${FIELD_SEPARATOR}"`,
      name,
    );
  }
  if (/[\r\n]/.test(name)) {
    throw new InvalidNameError(
      `Buffer name ${JSON.stringify(name)} contains a line break`,
      name,
    );
  }
}

/**
 * Validate then build the header for one named container.
 *
 * @throws {InvalidNameError} if the name is empty or contains `|` or a line break
 * @throws {UnsupportedElementTypeError} if the container's kind has no type code
 */
export function encodeHeader(name: string, container: Container): string {
  validateName(name);

  const descriptor = describe(container.kind);
  if (descriptor.width === 0) {
    throw new UnsupportedElementTypeError(
      `Buffer "${name}" has unsupported element kind "${container.kind}"`,
      container.kind,
    );
  }

  return buildHeader(
    name,
    descriptor,
    container.elementCount(),
    formatShape(container.shape()),
  );
}
