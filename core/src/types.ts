export type Keyable = string | number;
