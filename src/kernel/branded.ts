type Brand<TBase, TBrand extends string> = TBase & { readonly __brand: TBrand };

export type EventId = Brand<string, 'EventId'>;
export type ConditionId = Brand<string, 'ConditionId'>;
export type ActionId = Brand<string, 'ActionId'>;
export type EndConditionId = Brand<string, 'EndConditionId'>;

export const asEventId = (value: string): EventId => value as EventId;
export const asConditionId = (value: string): ConditionId => value as ConditionId;
export const asActionId = (value: string): ActionId => value as ActionId;
export const asEndConditionId = (value: string): EndConditionId => value as EndConditionId;
