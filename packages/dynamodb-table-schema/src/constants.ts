import {BillingMode} from '@aws-sdk/client-dynamodb';

export const DEFAULT_BILLING_MODE: BillingMode = 'PROVISIONED';

export const DEFAULT_READ_CAPACITY = 3;

export const DEFAULT_WRITE_CAPACITY = 3;
