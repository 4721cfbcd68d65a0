import { TrackInit, LIBRARY_NAME } from '@initrack/tracker';

export interface ForwardOptions {
  outputHiddenStates?: boolean;
  outputAttentions?: boolean;
  returnDict?: boolean;
}

export interface ModelOutput {
  logits: number[];
  hiddenStates?: number[][];
  attentions?: number[][];
}

export interface BertOptions {
  hiddenSize?: number;
  numLayers?: number;
  dropout?: number;
}

export interface RobertaOptions extends BertOptions {
  padTokenId?: number;
}

// Toy models: scaled token ids stand in for real activations.
@TrackInit({ library: LIBRARY_NAME, project: 'testbed' })
export class PretrainedModel {
  initialized = false;
  readonly family: string;

  constructor(family = 'pretrained') {
    this.family = family;
  }

  postInit() {
    this.initialized = true;
  }

  protected scale() {
    return 1;
  }

  forward(
    inputIds: number[],
    { outputHiddenStates = false, outputAttentions = false, returnDict = false }: ForwardOptions = {}
  ): ModelOutput | number[] {
    const logits = inputIds.map((id) => id * this.scale());
    if (!returnDict) return logits;
    const output: ModelOutput = { logits };
    if (outputHiddenStates) output.hiddenStates = [inputIds.slice(), logits];
    if (outputAttentions) output.attentions = inputIds.map(() => inputIds.map(() => 1 / inputIds.length));
    return output;
  }
}

@TrackInit()
export class BertModel extends PretrainedModel {
  readonly vocabSize: number;
  readonly hiddenSize: number;
  readonly numLayers: number;
  readonly dropout: number;

  constructor(vocabSize: number, { hiddenSize = 768, numLayers = 12, dropout = 0.1 }: BertOptions = {}) {
    super('bert');
    this.vocabSize = vocabSize;
    this.hiddenSize = hiddenSize;
    this.numLayers = numLayers;
    this.dropout = dropout;
  }

  protected scale() {
    return this.numLayers;
  }
}

@TrackInit()
export class RobertaModel extends BertModel {
  readonly padTokenId: number;

  constructor(vocabSize: number, { padTokenId = 1, ...rest }: RobertaOptions = {}) {
    super(vocabSize, rest);
    this.padTokenId = padTokenId;
  }
}

export class RobertaForTokenClassification extends RobertaModel {}

@TrackInit({ modelType: 'tiny' })
export class TinyLM extends PretrainedModel {
  constructor(readonly width = 4) {
    super('tiny');
  }
}
