export * from './engine';
export * from './bootstrap';
export * from './config/engine-config';
export * from './lib/logger';
export * from './lib/background-tasks';
export * from './lib/engine-context';

export * from './models/slot';
export * from './models/waitlist-entry';
export * from './models/booking-token';
export * from './models/notification-record';

export * from './store/document-store';
export * from './store/record-collection';
export * from './store/in-memory-store';
export * from './store/firestore-store';

export * from './channels/notification-channel';
export * from './channels/sms-channel';
export * from './channels/email-channel';

export * from './services/matcher-service';
export * from './services/token-issuer-service';
export * from './services/notification-templates';
export * from './services/notification-service';
export * from './services/booking-service';
export * from './services/wave-service';
export * from './services/expiry-reaper';
export * from './services/cancellation-service';
export * from './services/waitlist-service';
export * from './services/schedule-service';
export * from './services/fill-metrics';

export * from './utils/date-utils';
export * from './utils/errors';
export * from './utils/error-emitter';
export * from './utils/key-utils';
