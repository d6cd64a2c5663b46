import { registerAs } from '@nestjs/config';

export default registerAs('metadata', () => ({
  googleBooksApiKey: process.env.GOOGLE_BOOKS_API_KEY || null,
  googleBooksUrl: 'https://www.googleapis.com/books/v1/volumes',
}));
