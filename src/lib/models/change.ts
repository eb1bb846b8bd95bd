export type ChangeKind = 'created' | 'modified' | 'deleted' | 'renamed';

export type FileChange =
    | {
        kind: 'created' | 'modified' | 'deleted';
        path: string;
    }
    | {
        kind: 'renamed';
        path: string;
        previousPath: string;
    };

export type ChangeRecord = Readonly<FileChange & {
    sequence: number;
    timestamp: string;
}>;

export type ClosingReason = 'shutdown' | 'watch-lost';

export interface IGapMarker {
    type: 'gap';
    // inclusive range
    from: number;
    to: number;
}

export interface IClosingNotice {
    type: 'closing';
    reason: ClosingReason;
    sequence: number;
}

export interface IChangeDelivery {
    type: 'change';
    record: ChangeRecord;
}

export type Delivery = IChangeDelivery | IGapMarker | IClosingNotice;
