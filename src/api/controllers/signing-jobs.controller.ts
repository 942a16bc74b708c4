import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  StreamableFile,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { SubmitSigningJobUseCase } from '../../application/use-cases/submit-signing-job.use-case';
import { GetSigningJobUseCase } from '../../application/use-cases/get-signing-job.use-case';
import { GetSignedArtifactUseCase } from '../../application/use-cases/get-signed-artifact.use-case';
import { FormatValidatorService } from '../../shared/validation/format-validator.service';
import { ValidationError } from '../../domain/errors/signing-service.errors';
import { parseUploadVideoBody } from '../dto/upload-video.dto';
import {
  toSigningJobStatusResponse,
  toUploadVideoResponse,
  type SigningJobStatusResponseDto,
  type UploadVideoResponseDto,
} from '../dto/signing-job-response.dto';

@Controller()
export class SigningJobsController {
  constructor(
    private readonly submitSigningJob: SubmitSigningJobUseCase,
    private readonly getSigningJob: GetSigningJobUseCase,
    private readonly getSignedArtifact: GetSignedArtifactUseCase,
    private readonly formatValidator: FormatValidatorService,
  ) {}

  @Post('upload-video')
  @HttpCode(HttpStatus.ACCEPTED)
  @UseInterceptors(FileInterceptor('file'))
  async uploadVideo(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() body: unknown,
  ): Promise<UploadVideoResponseDto> {
    if (!file) {
      throw new ValidationError(
        'No video uploaded: expected a multipart "file" field',
        this.formatValidator.getAcceptedFormats(),
      );
    }

    const { device_info } = parseUploadVideoBody(body);
    const result = await this.submitSigningJob.execute({
      originalName: file.originalname,
      sourcePath: file.path,
      deviceInfo: device_info,
    });

    return toUploadVideoResponse(result);
  }

  @Get('video-status/:jobId')
  async getStatus(@Param('jobId') jobId: string): Promise<SigningJobStatusResponseDto> {
    return toSigningJobStatusResponse(await this.getSigningJob.execute(jobId));
  }

  @Get('download-signed-video/:jobId')
  async download(@Param('jobId') jobId: string): Promise<StreamableFile> {
    const artifact = await this.getSignedArtifact.execute(jobId);

    return new StreamableFile(artifact.stream, {
      type: artifact.contentType,
      disposition: `attachment; filename="${artifact.fileName}"`,
      length: artifact.contentLength,
    });
  }
}
