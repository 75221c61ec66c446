/** Order book levels fetched for every depth-based computation. */
export const ORDER_BOOK_DEPTH = 100;
