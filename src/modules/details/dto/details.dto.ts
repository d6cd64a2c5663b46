import { IsNotEmpty, IsOptional, IsString, IsUrl } from 'class-validator';

export class DetailsRequestDto {
  @IsString()
  @IsNotEmpty()
  title!: string;

  @IsString()
  @IsNotEmpty()
  sourceName!: string;

  @IsUrl({ require_tld: false, require_protocol: true })
  url!: string;

  /** Narrows the metadata lookup when the caller already knows the author. */
  @IsOptional()
  @IsString()
  author?: string;
}
