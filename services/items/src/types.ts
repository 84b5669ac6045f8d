export type ItemId = number;

export interface Item {
  id: ItemId;
  name: string;
}

// Write input: the store assigns the id
export interface ItemInput {
  name: string;
}

export type SqlParam = string | number | bigint | null;
