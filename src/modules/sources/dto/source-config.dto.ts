import { Type } from 'class-transformer';
import { IsDefined, IsIn, IsNotEmpty, IsObject, IsOptional, IsString, IsUrl, ValidateNested } from 'class-validator';

export type SourceKind = 'custom' | 'archive';

export interface SearchRules {
  url: string;
  itemContainerSelector: string;
  titleSelector: string;
  urlSelector: string;
}

export interface DetailsRules {
  chapterContainerSelector: string;
  chapterUrlSelector: string;
  authorSelector?: string;
  descriptionSelector?: string;
  coverImageUrlSelector?: string;
}

export interface SourceRules {
  search: SearchRules;
  details: DetailsRules;
}

export interface CustomSourceConfig {
  type?: 'custom';
  name: string;
  baseUrl: string;
  rules: SourceRules;
}

export interface ArchiveSourceConfig {
  type: 'archive';
  name: string;
  baseUrl?: string;
  collection?: string;
}

export type SourceConfig = CustomSourceConfig | ArchiveSourceConfig;

export class SearchRulesDto implements SearchRules {
  @IsString()
  @IsNotEmpty()
  url!: string;

  @IsString()
  @IsNotEmpty()
  itemContainerSelector!: string;

  @IsString()
  @IsNotEmpty()
  titleSelector!: string;

  @IsString()
  @IsNotEmpty()
  urlSelector!: string;
}

export class DetailsRulesDto implements DetailsRules {
  @IsString()
  @IsNotEmpty()
  chapterContainerSelector!: string;

  @IsString()
  @IsNotEmpty()
  chapterUrlSelector!: string;

  @IsOptional()
  @IsString()
  authorSelector?: string;

  @IsOptional()
  @IsString()
  descriptionSelector?: string;

  @IsOptional()
  @IsString()
  coverImageUrlSelector?: string;
}

export class SourceRulesDto implements SourceRules {
  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => SearchRulesDto)
  search!: SearchRulesDto;

  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => DetailsRulesDto)
  details!: DetailsRulesDto;
}

export class CustomSourceConfigDto implements CustomSourceConfig {
  @IsOptional()
  @IsIn(['custom'])
  type?: 'custom';

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsUrl({ require_tld: false, require_protocol: true })
  baseUrl!: string;

  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => SourceRulesDto)
  rules!: SourceRulesDto;
}

export class ArchiveSourceConfigDto implements ArchiveSourceConfig {
  @IsIn(['archive'])
  type!: 'archive';

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @IsString()
  baseUrl?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  collection?: string;
}
