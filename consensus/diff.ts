import {
  bytesEqual,
  type Identifier,
  qualifierText,
} from "@swhid-conformance/identifier";

export type DiffCategory = "value_mismatch" | "missing_field" | "ordering";

/**
 * One structural difference between two identifiers, addressed by a JSON
 * pointer into the identifier's fields.
 */
export interface DiffEntry {
  readonly path: string;
  readonly expected?: string | number;
  readonly actual?: string | number;
  readonly category: DiffCategory;
}

function keys(identifier: Identifier): string[] {
  return identifier.qualifiers.map(({ key }) => key);
}

function valueOf(identifier: Identifier, key: string): string | undefined {
  let qualifier = identifier.qualifiers.find((q) => q.key === key);
  return qualifier ? qualifierText(qualifier.value) : undefined;
}

export function diffIdentifiers(
  expected: Identifier,
  actual: Identifier,
): DiffEntry[] {
  let entries: DiffEntry[] = [];
  let field = (path: string, e: string | number, a: string | number) => {
    if (e !== a) {
      entries.push({ path, expected: e, actual: a, category: "value_mismatch" });
    }
  };

  field("/scheme", expected.scheme.toLowerCase(), actual.scheme.toLowerCase());
  field("/version", expected.version, actual.version);
  field("/type", expected.type, actual.type);
  if (!bytesEqual(expected.hash, actual.hash)) {
    entries.push({
      path: "/hash",
      expected: expected.hashText,
      actual: actual.hashText,
      category: "value_mismatch",
    });
  }

  let expectedKeys = keys(expected);
  let actualKeys = keys(actual);
  for (let key of new Set([...expectedKeys, ...actualKeys])) {
    let e = valueOf(expected, key);
    let a = valueOf(actual, key);
    let path = `/qualifiers/${key}`;
    if (e === undefined || a === undefined) {
      entries.push({ path, expected: e, actual: a, category: "missing_field" });
    } else {
      let left = expected.qualifiers.find((q) => q.key === key);
      let right = actual.qualifiers.find((q) => q.key === key);
      if (left && right && !bytesEqual(left.value, right.value)) {
        entries.push({ path, expected: e, actual: a, category: "value_mismatch" });
      }
    }
  }

  let sameKeys = expectedKeys.length === actualKeys.length &&
    expectedKeys.every((key) => actualKeys.includes(key));
  if (sameKeys && expectedKeys.some((key, i) => key !== actualKeys[i])) {
    entries.push({
      path: "/qualifiers",
      expected: expectedKeys.join(","),
      actual: actualKeys.join(","),
      category: "ordering",
    });
  }

  return entries;
}
