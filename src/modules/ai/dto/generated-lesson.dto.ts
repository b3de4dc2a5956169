import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

export class GeneratedQuizQuestionDto {
  @IsString()
  @IsNotEmpty()
  question!: string;

  @IsArray()
  @ArrayMinSize(4)
  @ArrayMaxSize(4)
  @IsString({ each: true })
  options!: string[];

  @IsInt()
  @Min(0)
  @Max(3)
  correct_answer_index!: number;

  @IsString()
  explanation!: string;
}

export class GeneratedLessonContentDto {
  @IsString()
  @IsNotEmpty()
  content_markdown!: string;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => GeneratedQuizQuestionDto)
  quiz!: GeneratedQuizQuestionDto[];
}
