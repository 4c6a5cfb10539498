import {
  ArrayMinSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsString,
  Min,
} from 'class-validator';

export class ModelArtifactDto {
  @IsNotEmpty()
  @IsString()
  name!: string;

  @IsNotEmpty()
  @IsString()
  version!: string;

  @IsInt()
  @Min(1)
  sequenceLength!: number;

  @IsArray()
  @ArrayMinSize(2)
  @IsString({ each: true })
  labels!: string[];

  @IsArray()
  @IsNumber({ allowNaN: false, allowInfinity: false }, { each: true })
  bias!: number[];

  // 행: 클래스, 열: 위치별 one-hot (sequenceLength * 3)
  @IsArray()
  @IsArray({ each: true })
  weights!: number[][];
}
