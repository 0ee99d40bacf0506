/** Duration or epoch timestamp in milliseconds. */
export type Milliseconds = number
