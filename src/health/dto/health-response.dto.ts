import { ApiProperty } from '@nestjs/swagger';

/**
 * Response for GET /health endpoint
 */
export class HealthResponseDto {
  @ApiProperty({
    description: 'Overall health status',
    example: 'ok',
    enum: ['ok', 'error'],
  })
  status!: string;

  @ApiProperty({
    description: 'Detailed information about each health indicator when healthy',
    example: {
      server: { status: 'up' },
      scheduler: { status: 'up', running: true, roundTripInFlight: false, spamScoreInFlight: false },
    },
    required: false,
  })
  info?: Record<string, unknown>;

  @ApiProperty({
    description: 'Error information if health check failed',
    example: {
      scheduler: { status: 'down', running: false },
    },
    required: false,
  })
  error?: Record<string, unknown>;

  @ApiProperty({
    description: 'Detailed health check results for all indicators',
    example: {
      server: { status: 'up' },
      scheduler: { status: 'up', running: true },
    },
  })
  details!: Record<string, unknown>;
}
