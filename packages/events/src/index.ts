export {
  ChangeChannel,
  type ChangeChannelOptions,
  type ChangeHandler,
  type PropertyChangedEvent,
  type PropertyId,
  type Unsubscribe,
} from './change-channel.js';
