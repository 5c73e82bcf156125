// Anything that answers GET also answers HEAD, Node drops the body for us.
export const READ_METHODS = ['GET', 'HEAD'] as const;
