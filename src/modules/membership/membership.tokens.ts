export const GROUP_MANAGER = 'GROUP_MANAGER';
