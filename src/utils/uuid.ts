import { v4 as uuidv4 } from 'uuid';

export type IdPrefix = 'doc';

export function generateId(prefix?: IdPrefix): string {
  const id = uuidv4();
  return prefix ? `${prefix}-${id}` : id;
}
