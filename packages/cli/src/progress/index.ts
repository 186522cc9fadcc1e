/**
 * Terminal rendering of capture progress and verbose events.
 *
 * @packageDocumentation
 */

export {
    createCaptureProgressHandler,
    createVerboseHandler,
    formatUrlForLog,
    STATE_LABELS,
    type CaptureEventHandlerOptions,
} from './capture-event-handler.js';
