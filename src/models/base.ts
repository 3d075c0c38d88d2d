export type ID = string;
export type ISODateTime = string;
