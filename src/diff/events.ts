import { ChangeEvent, CreatedEvent, DeletedEvent, ModifiedEvent, WireEvent } from '../contracts/types'

export function createdEvent(path: string, newHash: string, timestamp: string): CreatedEvent {
  return Object.freeze({ eventType: 'created', path, newHash, timestamp })
}

export function modifiedEvent(
  path: string,
  oldHash: string,
  newHash: string,
  timestamp: string
): ModifiedEvent {
  if (oldHash === newHash) {
    throw new Error(`Modified event for ${path} requires differing hashes`)
  }
  return Object.freeze({ eventType: 'modified', path, oldHash, newHash, timestamp })
}

export function deletedEvent(path: string, oldHash: string, timestamp: string): DeletedEvent {
  return Object.freeze({ eventType: 'deleted', path, oldHash, timestamp })
}

export function oldHashOf(event: ChangeEvent): string | null {
  return event.eventType === 'created' ? null : event.oldHash
}

export function newHashOf(event: ChangeEvent): string | null {
  return event.eventType === 'deleted' ? null : event.newHash
}

export function toWireEvent(event: ChangeEvent, root: string): WireEvent {
  return {
    timestamp: event.timestamp,
    event_type: event.eventType,
    path: event.path,
    old_hash: oldHashOf(event),
    new_hash: newHashOf(event),
    root,
  }
}

/**
 * One-line human readable form, e.g. `modified a.txt (old=ab12.., new=cd34..)`
 */
export function describeEvent(event: ChangeEvent): string {
  switch (event.eventType) {
    case 'created':
      return `created ${event.path} (new=${event.newHash})`
    case 'modified':
      return `modified ${event.path} (old=${event.oldHash}, new=${event.newHash})`
    case 'deleted':
      return `deleted ${event.path} (old=${event.oldHash})`
  }
}
