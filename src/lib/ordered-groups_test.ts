import { test } from "node:test";
import { deepEqual } from "node:assert/strict";

import { OrderedGroups } from "./ordered-groups.ts";

test('groups iterate in first-insertion order', () => {
  const groups = new OrderedGroups<string, number>();
  groups.add('web', 1);
  groups.add('db', 2);
  groups.add('web', 3);
  groups.add('cache', 4);
  groups.add('db', 5);

  deepEqual([...groups], [
    ['web', [1, 3]],
    ['db', [2, 5]],
    ['cache', [4]],
  ]);
});

test('unknown keys have no members', () => {
  const groups = new OrderedGroups<string, number>();
  deepEqual(groups.get('missing'), []);
  deepEqual([...groups], []);
});
