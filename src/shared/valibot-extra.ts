import {
  _addIssue as addIssue,
  type BaseIssue,
  type BaseValidation,
  type ErrorMessage,
  setSpecificMessage,
} from "valibot";

/***************************************************************************************************
 *
 * lengthMultiple
 *
 **************************************************************************************************/

export interface LengthMultipleIssue<TInput extends string> extends BaseIssue<TInput> {
  readonly kind: "validation";
  readonly type: "length_multiple";
  readonly expected: `${number}n`;
  readonly received: `${number}`;
  readonly requirement: number;
}

export interface LengthMultipleAction<
  TInput extends string,
  TRequirement extends number,
  TMessage extends ErrorMessage<LengthMultipleIssue<TInput>> | undefined,
> extends BaseValidation<TInput, TInput, LengthMultipleIssue<TInput>> {
  readonly type: "length_multiple";
  readonly reference: typeof lengthMultiple;
  readonly expects: `${TRequirement}n`;
  readonly requirement: TRequirement;
  readonly message: TMessage;
}

/**
 * 文字列の長さが `requirement` の倍数であることを検証します。
 * バイト単位の 2 進数なら 8、16 進数なら 2、パディング済みのビット列なら 512 を指定します。
 *
 * @param requirement 長さの約数です。
 */
export function lengthMultiple<TInput extends string, const TRequirement extends number>(
  requirement: TRequirement,
): LengthMultipleAction<TInput, TRequirement, undefined>;

export function lengthMultiple<
  TInput extends string,
  const TRequirement extends number,
  const TMessage extends ErrorMessage<LengthMultipleIssue<TInput>> | undefined,
>(
  requirement: TRequirement,
  message: TMessage,
): LengthMultipleAction<TInput, TRequirement, TMessage>;

export function lengthMultiple(
  requirement: number,
  message?: ErrorMessage<LengthMultipleIssue<string>>,
): LengthMultipleAction<string, number, ErrorMessage<LengthMultipleIssue<string>> | undefined> {
  return {
    kind: "validation",
    type: "length_multiple",
    reference: lengthMultiple,
    async: false,
    expects: `${requirement}n`,
    requirement,
    message,
    "~run"(dataset, config) {
      if (dataset.typed && dataset.value.length % this.requirement !== 0) {
        addIssue(this, "length", dataset, config, {
          received: `${dataset.value.length}`,
        });
      }

      return dataset;
    },
  };
}

/*#__PURE__*/ setSpecificMessage(
  lengthMultiple,
  issue => `Invalid length: Expected a multiple of ${issue.requirement} but received ${issue.received}`,
  "en",
);
/*#__PURE__*/ setSpecificMessage(
  lengthMultiple,
  issue => `無効な長さ: ${issue.requirement} の倍数を期待しましたが、${issue.received} を受け取りました`,
  "ja",
);
