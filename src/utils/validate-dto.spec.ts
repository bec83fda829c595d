import { BadRequestException } from '@nestjs/common';
import { Type } from 'class-transformer';
import { IsInt, IsString, Min, ValidateNested } from 'class-validator';
import { validateDto } from './validate-dto';

class WindowDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  hours!: number;
}

class ReportDto {
  @IsString()
  owner!: string;

  @ValidateNested()
  @Type(() => WindowDto)
  window!: WindowDto;
}

describe('validateDto', () => {
  it('should return a transformed instance', async () => {
    const report = await validateDto(ReportDto, {
      owner: 'alice',
      window: { hours: '4' },
    });

    expect(report).toBeInstanceOf(ReportDto);
    expect(report.window).toBeInstanceOf(WindowDto);
    expect(report.window.hours).toBe(4);
  });

  it('should strip properties without decorators', async () => {
    const report = await validateDto(ReportDto, {
      owner: 'alice',
      window: { hours: 1 },
      admin: true,
    });

    expect(report).not.toHaveProperty('admin');
  });

  it('should report nested errors per property', async () => {
    const failure = await validateDto(ReportDto, {
      owner: 7,
      window: { hours: 0 },
    }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(BadRequestException);
    expect(
      failure instanceof BadRequestException ? failure.getResponse() : undefined,
    ).toEqual({
      status: 400,
      errors: {
        owner: 'owner must be a string',
        window: { hours: 'hours must not be less than 1' },
      },
    });
  });
});
