export const TABLE_EXISTS_ERROR_CODE = 'ResourceInUseException';

export const TABLE_NOT_FOUND_ERROR_CODE = 'ResourceNotFoundException';
