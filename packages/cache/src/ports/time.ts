export type { Milliseconds } from "@stowaway/store"

export type Seconds = number
