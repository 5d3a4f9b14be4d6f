export type SlotStatus = 'scheduled' | 'cancelled' | 'offering' | 'filled' | 'unfilled';

export type TimeOfDay = 'morning' | 'afternoon' | 'evening';

export type TimePreference = TimeOfDay | 'any';

type SlotFields = {
    id: string;
    date: string;       // yyyy-MM-dd
    time: string;       // HH:mm (24h)
    specialty: string;
    provider: string;
    durationMinutes: number;
    cycle: number;      // cancellation cycle, bumped only by an explicit reopen
    wave: number;       // 0 until the first wave is launched
    notifiedEntryIds: string[]; // every entry offered this slot in the current cycle
    cancellationReason?: string;
    cancelledAt?: string;
    offeringStartedAt?: string;
    closedAt?: string;
    createdAt: string;
    updatedAt: string;
};

export type OpenSlot = SlotFields & {
    status: 'scheduled' | 'cancelled' | 'offering' | 'unfilled';
};

export type FilledSlot = SlotFields & {
    status: 'filled';
    filledByEntryId: string;
    filledByTokenId: string;
    filledAt: string;
};

export type Slot = OpenSlot | FilledSlot;

export type DeactivationReason = 'patient' | 'staff' | 'booked';

export type WaitlistEntry = {
    id: string;
    patientName: string;
    phone?: string;     // digits only
    email?: string;
    specialty: string;
    preferredDates: string[];
    timePreferences: TimePreference[];
    active: boolean;
    notifiedCount: number;
    createdAt: string;
    updatedAt: string;
    deactivatedAt?: string;
    deactivationReason?: DeactivationReason;
    bookedSlotId?: string;
};

export type TokenState = 'issued' | 'used' | 'expired' | 'superseded';

type TokenFields = {
    id: string;
    secret: string;
    slotId: string;
    entryId: string;
    cycle: number;
    wave: number;
    issuedAt: string;
    expiresAt: string;
};

export type IssuedToken = TokenFields & { state: 'issued' };
export type UsedToken = TokenFields & { state: 'used'; usedAt: string };
export type ExpiredToken = TokenFields & { state: 'expired'; expiredAt: string };
export type SupersededToken = TokenFields & { state: 'superseded'; supersededAt: string };

export type BookingToken = IssuedToken | UsedToken | ExpiredToken | SupersededToken;

export type NotificationChannelName = 'sms' | 'email';

export type NotificationOutcome = 'delivered' | 'failed' | 'skipped';

export type FailureKind = 'transient' | 'permanent' | 'timeout';

export type NotificationRecord = {
    id: string;
    tokenId: string;
    slotId: string;
    entryId: string;
    channel: NotificationChannelName;
    attempt: number;
    sentAt: string;
    outcome: NotificationOutcome;
    latencyMs: number;
    providerId?: string;
    failureKind?: FailureKind;
    error?: string;
};

export type ChannelDispatchSummary = {
    channel: NotificationChannelName;
    outcome: NotificationOutcome;
    attempts: number;
    providerId?: string;
    error?: string;
};

export type DispatchStatus = 'pending' | 'sent' | 'failed';

export type DispatchResult = {
    tokenId: string;
    entryId: string;
    slotId: string;
    status: DispatchStatus;
    channels: ChannelDispatchSummary[];
    startedAt: string;
    completedAt?: string;
};

export type RejectionReason = 'NotFound' | 'Expired' | 'AlreadyUsed' | 'Superseded' | 'SlotUnavailable';

export type BookingResult =
    | { outcome: 'booked'; slot: FilledSlot; token: UsedToken }
    | { outcome: 'rejected'; reason: RejectionReason };

export type ClaimResponse = {
    id: string;
    tokenId: string;
    slotId: string;
    entryId: string;
    respondedAt: string;
    responseLatencyMs: number;
    result: 'Booked' | RejectionReason;
};
