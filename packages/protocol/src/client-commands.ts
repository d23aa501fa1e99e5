export interface UserMessageEnvelope {
  message: string
  requestId?: string
}

export type ClientCommand = UserMessageEnvelope
