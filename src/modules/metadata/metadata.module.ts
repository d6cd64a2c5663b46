import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BookMetadataProvider } from './book-metadata.provider';
import { GOOGLE_BOOKS_HTTP, GoogleBooksService, createGoogleBooksHttp } from './google-books.service';

@Module({
  providers: [
    { provide: GOOGLE_BOOKS_HTTP, inject: [ConfigService], useFactory: createGoogleBooksHttp },
    { provide: BookMetadataProvider, useClass: GoogleBooksService },
  ],
  exports: [BookMetadataProvider],
})
export class MetadataModule {}
