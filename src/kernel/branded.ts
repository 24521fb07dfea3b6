type Brand<TBase, TBrand extends string> = TBase & { readonly __brand: TBrand };

export type MoveId = Brand<string, 'MoveId'>;

export const asMoveId = (value: string): MoveId => value as MoveId;

export const isMoveId = (value: unknown): value is MoveId =>
  typeof value === 'string' && value.length > 0 && value === value.toUpperCase();

export const toMoveId = (name: string): MoveId => asMoveId(name.trim().toUpperCase());
