import { IsNotEmpty, IsString, IsUrl, MaxLength } from "class-validator";

export class CreateCheckoutSessionDTO {
  @IsNotEmpty()
  @IsString()
  @MaxLength(200)
  clientReferenceId: string;

  @IsNotEmpty()
  @IsString()
  customerId: string;

  @IsNotEmpty()
  @IsString()
  priceId: string;

  @IsNotEmpty()
  @IsUrl({ require_tld: false })
  successUrl: string;

  @IsNotEmpty()
  @IsUrl({ require_tld: false })
  cancelUrl: string;
}
