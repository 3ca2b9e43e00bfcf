// Trimmed country file covering the entities used across the tests
export const SAMPLE_COUNTRY_FILE = [
    'United States:            05:  08:  NA:   37.53:    91.67:     5.0:  K:',
    '    AA,AB,K,N,W,=W1AW/KH6(31)[61];',
    'Italy:                    15:  28:  EU:   42.82:   -12.58:    -1.0:  I:',
    '    I,IK0,IZ0;',
    'Sicily:                   15:  28:  EU:   37.50:   -14.00:    -1.0:  *IT9:',
    '    IT9,IW9,IY9;',
    'Hawaii:                   31:  61:  OC:   21.12:   157.48:    10.0:  KH6:',
    '    AH6,KH6,NH6,WH6;',
    'England:                  14:  27:  EU:   52.77:     1.47:     0.0:  G:',
    '    2E,G,M;',
].join('\n');

export const SAMPLE_ENTITY_NAMES: Record<string, string> = {
    '291': 'UNITED STATES OF AMERICA',
    '248': 'ITALY',
    '110': 'HAWAII',
    '223': 'ENGLAND',
};
