export type ChannelUnit =
  | 'BytesDisk'
  | 'Percent'
  | 'Count'
  | 'Custom'
  | 'TimeResponse'
  | 'SpeedDisk';

// Field names are the ones PRTG's advanced sensor JSON expects.
export interface Channel {
  channel: string;
  value: number;
  unit: ChannelUnit;
  customunit?: string;
  float?: 0 | 1;
  volumesize?: 'One' | 'KiloByte' | 'MegaByte' | 'GigaByte' | 'TeraByte' | 'Byte';
  speedsize?: 'One' | 'KiloByte' | 'MegaByte' | 'GigaByte' | 'TeraByte' | 'Byte';
  limitmode?: 0 | 1;
  limitmaxwarning?: number;
  limitmaxerror?: number;
  limitwarningmsg?: string;
  limiterrormsg?: string;
  valuelookup?: string;
}

export interface ResultEnvelope {
  prtg: {
    result: Channel[];
    text?: string;
  };
}

export interface ErrorEnvelope {
  prtg: {
    error: 1;
    text: string;
  };
}

export type Envelope = ResultEnvelope | ErrorEnvelope;
