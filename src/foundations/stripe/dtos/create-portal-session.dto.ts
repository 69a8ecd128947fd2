import { IsNotEmpty, IsOptional, IsString, IsUrl } from "class-validator";

export class CreatePortalSessionDTO {
  @IsNotEmpty()
  @IsString()
  customerId: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  returnUrl?: string;
}
